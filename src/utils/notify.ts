import { execFile } from 'child_process';
import { promisify } from 'util';
import { errorMessage } from '../errors.js';
import { createLogger } from './logger.js';

const execFileAsync = promisify(execFile);
const logger = createLogger('notify');

/** notify-send によるデスクトップ通知 (Linux のみ、失敗しても起動は止めない) */
export async function notify(message: string, enabled = true): Promise<void> {
  if (!enabled || process.platform !== 'linux') {
    return;
  }
  try {
    await execFileAsync('notify-send', [message], { timeout: 5000 });
  } catch (error: unknown) {
    logger.warn(`Desktop notification failed: ${errorMessage(error)}`);
  }
}
