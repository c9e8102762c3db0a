import { promises as fs } from 'node:fs';
import path from 'node:path';

export interface LogFileEntry {
  file_name: string;
  url: string;
  file_size: string;
}

/** A log file path that carries a null byte or leaves the log directory. */
export class InvalidLogFilePathError extends Error {
  public readonly code = 'ERR_INVALID_LOG_FILE_PATH';

  constructor(public readonly logFile: string) {
    super('Invalid log file path');
    this.name = 'InvalidLogFilePathError';
  }
}

/** Only names containing "log" are served, the same set the listing shows. */
export function isLogFileName(name: string): boolean {
  return name.includes('log');
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

async function walk(dir: string): Promise<string[]> {
  let entries;
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (isMissing(err)) return [];
    throw err;
  }

  const files: string[] = [];
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...await walk(full));
    } else if (entry.isFile()) {
      files.push(full);
    }
  }
  return files;
}

/**
 * Every file under `logPath` whose name contains "log", keyed `<name>_<n>` so
 * rotated files sharing a name stay distinct. URLs point at the log file route.
 */
export async function listLogFiles(logPath: string, baseUrl: string): Promise<Record<string, LogFileEntry>> {
  const root = path.resolve(logPath);
  const files = (await walk(root))
    .filter((file) => isLogFileName(path.basename(file)))
    .sort();

  const result: Record<string, LogFileEntry> = {};
  let counter = 0;

  for (const file of files) {
    counter += 1;
    const name = path.basename(file);
    const relative = path.relative(root, file).split(path.sep).join('/');
    const { size } = await fs.stat(file);

    result[`${name}_${counter}`] = {
      file_name: name,
      url: `${baseUrl}/get_log_file/?log_file=${encodeURIComponent(relative)}`,
      file_size: `${size} bytes`,
    };
  }

  return result;
}

/**
 * Resolves a log file named relative to `logPath`. Returns null when it does not
 * exist, is not a regular file or is not a log file by name.
 *
 * @throws {InvalidLogFilePathError} when the name resolves outside `logPath`
 */
export async function resolveLogFile(logPath: string, logFile: string): Promise<string | null> {
  if (logFile.includes('\0')) {
    throw new InvalidLogFilePathError(logFile);
  }

  const root = path.resolve(logPath);
  const resolved = path.resolve(root, logFile);
  // Trailing separator keeps /logs from matching /logs-old
  if (!resolved.startsWith(`${root}${path.sep}`)) {
    throw new InvalidLogFilePathError(logFile);
  }

  if (!isLogFileName(path.basename(resolved))) return null;

  try {
    const stats = await fs.stat(resolved);
    return stats.isFile() ? resolved : null;
  } catch (err) {
    if (isMissing(err)) return null;
    throw err;
  }
}
