import { describe, it, expect, vi } from 'vitest';
import { PassThrough } from 'node:stream';
import { MissingInputError } from '@pylayer/core';
import { LIBRARIES_PROMPT, askQuestion, resolveLibraries, splitLibraries } from './prompt.js';

describe('splitLibraries', () => {
  it('splits on any whitespace', () => {
    expect(splitLibraries('  requests   attrs\tpyyaml ')).toEqual(['requests', 'attrs', 'pyyaml']);
  });

  it('returns nothing for a blank answer', () => {
    expect(splitLibraries('   ')).toEqual([]);
  });
});

describe('resolveLibraries', () => {
  it('uses libraries from the command line without prompting', async () => {
    const ask = vi.fn(async () => 'ignored');
    const libraries = await resolveLibraries({ libraries: ['requests'] }, { interactive: true, ask });

    expect(libraries).toEqual(['requests']);
    expect(ask).not.toHaveBeenCalled();
  });

  it('does not prompt when a requirements file is given', async () => {
    const ask = vi.fn(async () => 'ignored');
    const libraries = await resolveLibraries({ requirementsFile: 'requirements.txt' }, { interactive: true, ask });

    expect(libraries).toEqual([]);
    expect(ask).not.toHaveBeenCalled();
  });

  it('prompts when nothing was given', async () => {
    const ask = vi.fn(async () => 'requests attrs');
    const libraries = await resolveLibraries({}, { interactive: true, ask });

    expect(ask).toHaveBeenCalledWith(LIBRARIES_PROMPT);
    expect(libraries).toEqual(['requests', 'attrs']);
  });

  it('fails when the prompt answer is empty', async () => {
    const ask = vi.fn(async () => '');
    await expect(resolveLibraries({}, { interactive: true, ask })).rejects.toBeInstanceOf(MissingInputError);
  });

  it('fails without prompting when input is not interactive', async () => {
    const ask = vi.fn(async () => 'requests');
    await expect(resolveLibraries({ libraries: [] }, { interactive: false, ask }))
      .rejects.toBeInstanceOf(MissingInputError);
    expect(ask).not.toHaveBeenCalled();
  });
});

describe('askQuestion', () => {
  it('resolves with the typed line', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const answer = askQuestion('Libraries? ', { input, output });

    input.write('requests attrs\n');

    await expect(answer).resolves.toBe('requests attrs');
  });

  it('resolves empty when input ends', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const answer = askQuestion('Libraries? ', { input, output });

    input.end();

    await expect(answer).resolves.toBe('');
  });
});
