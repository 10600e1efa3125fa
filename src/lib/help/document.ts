import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { MalformedInputError } from '../../errors.js';
import { HELP_WIDTH } from '../../constants.js';
import type { CommandHost } from '../host/types.js';

const hasUtf16Bom = (bytes: Uint8Array): boolean => bytes.length >= 2 && bytes[0] === 0xff && bytes[1] === 0xfe;

/**
 * Decode exported help text. UTF-16LE is accepted when it carries a BOM,
 * anything else must be valid UTF-8.
 */
export const decodeHelpText = (bytes: Uint8Array, command: string): string => {
  const encoding = hasUtf16Bom(bytes) ? 'utf-16le' : 'utf-8';
  let text: string;

  try {
    text = new TextDecoder(encoding, { fatal: true }).decode(bytes);
  } catch {
    throw new MalformedInputError(command, `not valid ${encoding.toUpperCase()} text`);
  }

  if (text.includes('\u0000')) {
    throw new MalformedInputError(command, 'contains NUL characters');
  }
  return text;
};

const scratchFileName = (command: string): string => `${command.replace(/[^\w.-]/g, '_')}.txt`;

/**
 * Fetch the help text of one command through a scratch file that is removed
 * whether or not the export succeeds.
 */
export const readHelpDocument = async (
  host: CommandHost,
  command: string,
  width: number = HELP_WIDTH
): Promise<string> => {
  const scratchDir = await mkdtemp(join(tmpdir(), 'cmdoc-help-'));

  try {
    const file = join(scratchDir, scratchFileName(command));
    await host.exportHelp(command, file, width);

    let bytes: Buffer;
    try {
      bytes = await readFile(file);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new MalformedInputError(command, 'the host produced no help text');
      }
      throw error;
    }
    return decodeHelpText(bytes, command);
  } finally {
    await rm(scratchDir, { recursive: true, force: true });
  }
};
