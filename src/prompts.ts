import inquirer from 'inquirer';
import chalk from 'chalk';
import { InvalidPathError, UserCancellationError, WatermarkError } from './errors.js';
import { resolveInput, type ResolvedInput } from './inputResolver.js';
import { ANCHORS } from './placement.js';
import { parseFontSize, resolveAnchor, resolveColor } from './vocabulary.js';
import type { Anchor, ResolvedColor } from './types.js';

export interface PromptedRequest {
  input: ResolvedInput;
  fontSize: number;
  color: ResolvedColor;
  anchor: Anchor;
}

interface RawAnswers {
  inputPath: string;
  fontSize: string;
  color: string;
  position: string;
}

/** Turns a parser's domain error into inquirer's "show this and ask again" message. */
export function validateWith(parse: (value: string) => unknown): (value: string) => true | string {
  return value => {
    try {
      parse(value);
      return true;
    } catch (error) {
      if (error instanceof WatermarkError) {
        return error.message;
      }
      throw error;
    }
  };
}

export async function validatePath(value: string): Promise<true | string> {
  try {
    await resolveInput(value);
    return true;
  } catch (error) {
    if (error instanceof InvalidPathError) {
      return 'Path not found. Enter an existing image file or a folder of images.';
    }
    throw error;
  }
}

export async function promptForRequest(): Promise<PromptedRequest> {
  let answers: RawAnswers;
  try {
    answers = await inquirer.prompt<RawAnswers>([
      {
        type: 'input',
        name: 'inputPath',
        message: chalk.bold('Image file or folder:'),
        prefix: '📁',
        validate: validatePath
      },
      {
        type: 'input',
        name: 'fontSize',
        message: chalk.bold('Font size (e.g. 36):'),
        prefix: '🔠',
        default: '36',
        validate: validateWith(parseFontSize)
      },
      {
        type: 'input',
        name: 'color',
        message: chalk.bold('Colour (white, black, 白色, #FFFFFF):'),
        prefix: '🎨',
        default: 'white',
        validate: validateWith(resolveColor)
      },
      {
        type: 'input',
        name: 'position',
        message: chalk.bold(`Position (${ANCHORS.join(' / ')}, or 左上 / 右下 / 居中 ...):`),
        prefix: '📍',
        default: 'right_bottom',
        validate: validateWith(resolveAnchor)
      }
    ]);
  } catch (error) {
    if (error instanceof Error && error.name === 'ExitPromptError') {
      throw new UserCancellationError();
    }
    throw error;
  }

  return {
    input: await resolveInput(answers.inputPath),
    fontSize: parseFontSize(answers.fontSize),
    color: resolveColor(answers.color),
    anchor: resolveAnchor(answers.position)
  };
}

/** Plain-text recap of what the run will do, shown before the batch starts. */
export function describeRequest({ input, fontSize, color, anchor }: PromptedRequest): string[] {
  const colorLabel = color.input === color.canonical ? color.canonical : `${color.input} → ${color.canonical}`;
  return [
    `Source ${input.kind}: ${input.sourceDir}`,
    `${fontSize}pt · ${colorLabel} (${color.hex}) · ${anchor}`
  ];
}
