import fs from 'fs-extra';
import os from 'os';
import path from 'path';

export async function makeTempDir(prefix = 'segmenter-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/** Writes an executable /bin/sh script standing in for ffmpeg. */
export async function writeFakeTool(dir: string, name: string, body: string): Promise<string> {
  const toolPath = path.join(dir, name);
  await fs.writeFile(toolPath, `#!/bin/sh\n${body}\n`, { mode: 0o755 });
  return toolPath;
}

export async function readJson(filePath: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(filePath, 'utf8'));
}
