import { createWriteStream, existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import archiver from 'archiver';
import { z } from 'zod';
import { log, logFilePath } from './logger';
import { loadState } from './store';

const RECENT_ERRORS_LIMIT = 50;

const RecentErrorSchema = z.object({
  timestamp: z.number(),
  message: z.string(),
});
export type RecentError = z.infer<typeof RecentErrorSchema>;

const diagnosticsDir = (dataDir: string) => join(dataDir, 'diagnostics');
const errorsFile = (dataDir: string) => join(dataDir, 'recent-errors.json');

export const redactSecrets = (value: string) =>
  value
    .replace(/\bBearer\s+[A-Za-z0-9._-]+\b/gi, 'Bearer REDACTED')
    .replace(/\b(api[_-]?key|token)=([^&\s]+)/gi, '$1=REDACTED');

export const loadRecentErrors = (dataDir: string): RecentError[] => {
  try {
    if (!existsSync(errorsFile(dataDir))) return [];
    const parsed = z
      .array(RecentErrorSchema)
      .safeParse(JSON.parse(readFileSync(errorsFile(dataDir), 'utf-8')));
    return parsed.success ? parsed.data : [];
  } catch (error) {
    log.error('Failed to read recent errors', error);
    return [];
  }
};

export const recordError = (dataDir: string, error: unknown) => {
  const entry: RecentError = {
    timestamp: Date.now(),
    message: redactSecrets(error instanceof Error ? error.message : String(error)),
  };
  log.error(entry.message);
  try {
    const existing = loadRecentErrors(dataDir);
    existing.unshift(entry);
    mkdirSync(dataDir, { recursive: true });
    writeFileSync(
      errorsFile(dataDir),
      JSON.stringify(existing.slice(0, RECENT_ERRORS_LIMIT), null, 2),
      'utf-8'
    );
  } catch (writeError) {
    log.error('Failed to write recent errors', writeError);
  }
};

export const exportDiagnostics = async (dataDir: string) => {
  const targetDir = diagnosticsDir(dataDir);
  if (!existsSync(targetDir)) {
    mkdirSync(targetDir, { recursive: true });
  }
  const filePath = join(targetDir, `keyprompt-diagnostics-${Date.now()}.zip`);
  const archive = archiver('zip', { zlib: { level: 9 } });
  const stream = createWriteStream(filePath);

  return new Promise<{ filePath: string }>((resolve, reject) => {
    stream.on('close', () => resolve({ filePath }));
    archive.on('error', (err: Error) => reject(err));

    archive.pipe(stream);

    const { settings } = loadState(dataDir);
    archive.append(JSON.stringify(settings, null, 2), { name: 'settings.json' });
    archive.append(JSON.stringify(loadRecentErrors(dataDir), null, 2), {
      name: 'recent-errors.json',
    });

    const logFile = logFilePath(dataDir);
    if (existsSync(logFile)) {
      archive.file(logFile, { name: 'logs/agent.log' });
    }

    archive.finalize().catch(reject);
  });
};
