import { existsSync } from 'node:fs';
import path from 'node:path';
import { getConfig } from '../config/index.js';

/** Image version updates are frozen while the sentinel file exists. */
export function isImageFreezeActive(freezeFilePath: string = getConfig().FREEZE_FILE_PATH): boolean {
  return existsSync(path.resolve(freezeFilePath));
}
