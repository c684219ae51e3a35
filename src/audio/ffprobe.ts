import { spawn } from 'node:child_process';

/** Track duration in seconds as reported by ffprobe. */
export async function probeDuration(audioPath: string, ffprobePath = 'ffprobe'): Promise<number> {
  const output = await new Promise<string>((resolve, reject) => {
    const processHandle = spawn(ffprobePath, [
      '-v',
      'error',
      '-show_entries',
      'format=duration',
      '-of',
      'default=noprint_wrappers=1:nokey=1',
      audioPath,
    ]);
    let stdout = '';
    processHandle.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });

    processHandle.on('error', reject);
    processHandle.on('close', (code) => {
      if (code === 0) {
        resolve(stdout);
      } else {
        reject(new Error(`ffprobe exited with code ${code}`));
      }
    });
  });

  const duration = Number(output.trim());
  if (!Number.isFinite(duration) || duration <= 0) {
    throw new Error(`ffprobe reported no duration for ${audioPath}`);
  }
  return duration;
}
