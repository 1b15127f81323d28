import { z } from 'zod';
import { ValidationError } from '../errors.js';
import type { Coordinate, Locator } from '../types.js';
import type { ToolContext } from './registry.js';

export const outputFormat = z.enum(['text', 'json']).default('text');

/** Exact (`line` + `character`) or fuzzy (`symbol` + `code_block` + `occurrence`). */
export const locatorParams = {
  file_path: z.string().min(1),
  line: z.number().int().optional(),
  character: z.number().int().optional(),
  symbol: z.string().min(1).optional(),
  code_block: z.string().min(1).optional(),
  occurrence: z.number().int().default(0),
  output_format: outputFormat,
};

const locatorObject = z.object(locatorParams);
export type LocatorParams = z.infer<typeof locatorObject>;

export const locatorProperties = {
  file_path: {
    type: 'string',
    description: 'Absolute path to the Rust source file',
  },
  line: {
    type: 'integer',
    description: 'Zero-based line number. Use with character for an exact position',
  },
  character: {
    type: 'integer',
    description: 'Zero-based character offset within the line. Use with line',
  },
  symbol: {
    type: 'string',
    description: 'Name of the symbol to target. Use with code_block when no exact position is known',
  },
  code_block: {
    type: 'string',
    description:
      'A snippet copied verbatim from the file (a few lines) that contains the symbol, used to find it',
  },
  occurrence: {
    type: 'integer',
    description: 'Zero-based index of the symbol among its whole-word matches inside code_block',
    default: 0,
  },
};

export function toLocator(params: LocatorParams): Locator {
  const { file_path: filePath, line, character, symbol, code_block: codeBlock, occurrence } = params;
  if (line !== undefined && character !== undefined) {
    return { kind: 'exact', filePath, line, character };
  }
  if (symbol !== undefined && codeBlock !== undefined) {
    return { kind: 'fuzzy', filePath, codeBlock, symbol, occurrence };
  }
  throw new ValidationError(
    'invalid_params',
    'Provide either line and character, or symbol and code_block, to locate the target'
  );
}

/** Resolves in the encoding of the live session; exact positions need no session. */
export async function resolveLocator(ctx: ToolContext, params: LocatorParams): Promise<Coordinate> {
  const locator = toLocator(params);
  if (locator.kind === 'exact') return ctx.resolver.resolve(locator);
  return ctx.resolver.resolve(locator, await ctx.client.positionEncoding());
}

export function describeCoordinate(coordinate: Coordinate): string {
  return `${coordinate.filePath}:${coordinate.position.line + 1}:${coordinate.position.character + 1}`;
}
