import { mkdir, writeFile } from 'fs/promises';
import path from 'path';

const pad = (value: number) => String(value).padStart(2, '0');

export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`
  );
}

export function artifactNames(inputPath: string, now: Date = new Date()): { log: string; output: string } {
  const prefix = `${formatTimestamp(now)}_${path.basename(inputPath)}`;
  return { log: `${prefix}_promptchain.log`, output: `${prefix}_output.txt` };
}

export type RunArtifacts = {
  outDir: string;
  inputPath: string;
  log: string;
  // Absent for failed runs; only the log is written then.
  output?: string;
  now?: Date;
};

export async function writeRunArtifacts({
  outDir,
  inputPath,
  log,
  output,
  now = new Date()
}: RunArtifacts): Promise<{ logPath: string; outputPath?: string }> {
  const names = artifactNames(inputPath, now);
  await mkdir(outDir, { recursive: true });

  const logPath = path.join(outDir, names.log);
  await writeFile(logPath, log, 'utf-8');

  if (output === undefined) {
    return { logPath };
  }

  const outputPath = path.join(outDir, names.output);
  await writeFile(outputPath, output, 'utf-8');
  return { logPath, outputPath };
}
