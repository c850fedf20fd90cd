/**
 * Batch command assembly
 */

import { Readable } from 'node:stream';
import {
  collectBatchCommands,
  readAll,
  splitCommandLines,
  type BatchInputSource,
} from '../../../src/cli/batch-input.js';

function pipedStdin(text: string): BatchInputSource['stdin'] {
  return Object.assign(Readable.from([Buffer.from(text, 'utf-8')]), { isTTY: false });
}

function terminalStdin(): BatchInputSource['stdin'] {
  return Object.assign(Readable.from([]), { isTTY: true });
}

describe('splitCommandLines', () => {
  it('splits on newlines and drops the final empty line', () => {
    expect(splitCommandLines('*RST\n*IDN?\n')).toEqual(['*RST', '*IDN?']);
  });

  it('keeps a last line without terminator', () => {
    expect(splitCommandLines('*RST\n*IDN?')).toEqual(['*RST', '*IDN?']);
  });

  it('drops carriage returns before newlines', () => {
    expect(splitCommandLines('*RST\r\n*IDN?\r\n')).toEqual(['*RST', '*IDN?']);
  });

  it('keeps blank lines in the middle', () => {
    expect(splitCommandLines('A\n\nB')).toEqual(['A', '', 'B']);
  });

  it('yields nothing for empty text', () => {
    expect(splitCommandLines('')).toEqual([]);
  });
});

describe('readAll', () => {
  it('joins chunks split inside a multi-byte character', async () => {
    const bytes = Buffer.from('µV?\n', 'utf-8');
    const stream = Readable.from([bytes.subarray(0, 1), bytes.subarray(1)]);

    expect(await readAll(stream)).toBe('µV?\n');
  });
});

describe('collectBatchCommands', () => {
  it('uses piped stdin over -c', async () => {
    const commands = await collectBatchCommands({ command: '*CLS', stdin: pipedStdin('*RST\nVOLT?\n') });

    expect(commands).toEqual(['*RST', 'VOLT?']);
  });

  it('uses -c text on a terminal', async () => {
    const commands = await collectBatchCommands({ command: '*RST\n*IDN?', stdin: terminalStdin() });

    expect(commands).toEqual(['*RST', '*IDN?']);
  });

  it('returns null for an interactive session', async () => {
    expect(await collectBatchCommands({ stdin: terminalStdin() })).toBeNull();
  });
});
