import { writeText } from '../lib/fs.js';
import { log } from '../lib/log.js';

export async function writeMarkdownReport(filePath: string, markdown: string): Promise<void> {
  await writeText(filePath, markdown);
  log.info('report written', { filePath });
}
