import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { CommandExecutionError } from '@pylayer/core';
import {
  createTempDir,
  executeCommand,
  pathExists,
  removePath,
  type CommandResult,
  type CommandRunner,
} from '@pylayer/utils';
import { ZipArchiver } from './archiver.js';

function result(overrides: Partial<CommandResult> = {}): CommandResult {
  return { exitCode: 0, stdout: '', stderr: '', duration: 5, timedOut: false, ...overrides };
}

const zipAvailable = await executeCommand('zip', ['-v']).then(
  (version) => version.exitCode === 0,
  () => false
);

/**
 * Entry names from a zip's central directory
 */
function zipEntryNames(data: Buffer): string[] {
  const endOfDirectory = data.lastIndexOf(Buffer.from([0x50, 0x4b, 0x05, 0x06]));
  const count = data.readUInt16LE(endOfDirectory + 10);
  let offset = data.readUInt32LE(endOfDirectory + 16);

  const names: string[] = [];
  for (let i = 0; i < count; i++) {
    const nameLength = data.readUInt16LE(offset + 28);
    const extraLength = data.readUInt16LE(offset + 30);
    const commentLength = data.readUInt16LE(offset + 32);
    names.push(data.toString('utf8', offset + 46, offset + 46 + nameLength));
    offset += 46 + nameLength + extraLength + commentLength;
  }
  return names;
}

describe('ZipArchiver', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await createTempDir('pylayer-archiver-');
  });

  afterEach(async () => {
    await removePath(workDir);
  });

  it('zips the runtime prefix from inside the source dir', async () => {
    const outputPath = join(workDir, 'out', 'deps.zip');
    const runner = vi.fn<CommandRunner>(async (_command, args) => {
      await writeFile(args[2] ?? '', 'zipdata');
      return result();
    });
    const archiver = new ZipArchiver({ zipPath: 'zip', runner, timeout: 1000 });

    const archive = await archiver.archive({ sourceDir: '/tmp/build', entry: 'python', outputPath });

    expect(runner).toHaveBeenCalledWith('zip', ['-q', '-r', outputPath, 'python'], {
      cwd: '/tmp/build',
      timeout: 1000,
    });
    expect(archive).toEqual({ path: outputPath, size: 7 });
  });

  it('replaces a stale archive', async () => {
    const outputPath = join(workDir, 'deps.zip');
    await writeFile(outputPath, 'stale archive contents');
    let existedWhenZipRan = true;
    const runner = vi.fn<CommandRunner>(async (_command, args) => {
      existedWhenZipRan = await pathExists(outputPath);
      await writeFile(args[2] ?? '', 'new');
      return result();
    });

    await new ZipArchiver({ zipPath: 'zip', runner }).archive({ sourceDir: workDir, entry: 'python', outputPath });

    expect(existedWhenZipRan).toBe(false);
    expect(await readFile(outputPath, 'utf8')).toBe('new');
  });

  it('raises when zip fails', async () => {
    const runner = vi.fn<CommandRunner>(async () => result({ exitCode: 12, stderr: 'zip error: Nothing to do!' }));
    const archiver = new ZipArchiver({ zipPath: 'zip', runner });

    await expect(archiver.archive({ sourceDir: workDir, entry: 'python', outputPath: join(workDir, 'deps.zip') }))
      .rejects.toBeInstanceOf(CommandExecutionError);
  });

  it.skipIf(!zipAvailable)('roots every archive entry under the runtime prefix', async () => {
    const sourceDir = join(workDir, 'build');
    await mkdir(join(sourceDir, 'python', 'requests'), { recursive: true });
    await writeFile(join(sourceDir, 'python', 'requests', '__init__.py'), '');
    const outputPath = join(workDir, 'deps.zip');

    const archive = await new ZipArchiver({ zipPath: 'zip' }).archive({ sourceDir, entry: 'python', outputPath });

    const names = zipEntryNames(await readFile(archive.path)).sort();
    expect(names).toEqual(['python/', 'python/requests/', 'python/requests/__init__.py']);
  });
});
