import { randomBytes } from 'node:crypto';
import { mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { AuthError } from '../errors';
import { logWithContext, sanitizeError, type SafeLogger } from '../logging';
import { credentialFileSchema } from '../schemas';
import type { CredentialRecord } from '../types';

export interface CredentialFs {
  readFile(file: string): Promise<string>;
  writeFile(file: string, data: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  mkdir(dir: string): Promise<void>;
  unlink(file: string): Promise<void>;
}

export const nodeCredentialFs: CredentialFs = {
  readFile: (file) => readFile(file, 'utf8'),
  writeFile: (file, data) => writeFile(file, data, { encoding: 'utf8', mode: 0o600 }),
  rename: (from, to) => rename(from, to),
  mkdir: async (dir) => {
    await mkdir(dir, { recursive: true });
  },
  unlink: (file) => unlink(file)
};

export interface CredentialStoreOptions {
  /** Candidate locations, most preferred first. */
  paths: readonly string[];
  fs?: CredentialFs;
  logger?: SafeLogger;
  now?: () => Date;
}

export interface CredentialStore {
  load(): Promise<CredentialRecord>;
  saveSessionToken(sessionToken: string): Promise<string | undefined>;
  location(): string | undefined;
}

const errorCode = (error: unknown) =>
  error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;

/**
 * Shared credential file. Other processes may rewrite it at any time; there is no lock and the
 * last successful write wins. Writes go through a temp file and a rename so readers never see a
 * partially written document.
 */
export const createCredentialStore = ({
  paths,
  fs = nodeCredentialFs,
  logger,
  now = () => new Date()
}: CredentialStoreOptions): CredentialStore => {
  let activePath: string | undefined;
  let record: CredentialRecord | undefined;

  const readCandidate = async (file: string): Promise<CredentialRecord | undefined> => {
    let raw: string;
    try {
      raw = await fs.readFile(file);
    } catch (error) {
      logWithContext(logger, 'debug', 'credential file unreadable', { path: file, code: errorCode(error) });
      return undefined;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      logWithContext(logger, 'warn', 'credential file is not valid JSON', { path: file, err: sanitizeError(error) });
      return undefined;
    }

    const parsed = credentialFileSchema.safeParse(json);
    if (!parsed.success) {
      logWithContext(logger, 'warn', 'credential file has an unexpected shape', { path: file });
      return undefined;
    }
    return parsed.data;
  };

  const writeAtomically = async (file: string, contents: string) => {
    const temp = `${file}.${randomBytes(4).toString('hex')}.tmp`;
    await fs.mkdir(path.dirname(file));
    await fs.writeFile(temp, contents);
    try {
      await fs.rename(temp, file);
    } catch (error) {
      await fs.unlink(temp).catch((cleanupError: unknown) => {
        logWithContext(logger, 'debug', 'temp credential file left behind', { path: temp, err: sanitizeError(cleanupError) });
      });
      throw error;
    }
  };

  return {
    async load() {
      for (const file of paths) {
        const candidate = await readCandidate(file);
        if (!candidate) {
          continue;
        }
        if (!candidate.app_token.trim()) {
          throw new AuthError('application token is empty', { path: file });
        }
        activePath = file;
        record = candidate;
        logWithContext(logger, 'info', 'credentials loaded', {
          path: file,
          createdAt: candidate.created_at,
          hasSessionToken: Boolean(candidate.session_token)
        });
        return candidate;
      }

      throw new AuthError('no readable credential file', { paths: [...paths] });
    },

    async saveSessionToken(sessionToken) {
      if (!record) {
        logWithContext(logger, 'warn', 'session token not persisted: credentials were never loaded');
        return undefined;
      }

      const next: CredentialRecord = {
        ...record,
        session_token: sessionToken,
        last_session_update: now().toISOString()
      };
      const contents = `${JSON.stringify(next, null, 2)}\n`;
      const order = activePath ? [activePath, ...paths.filter((file) => file !== activePath)] : [...paths];

      for (const file of order) {
        try {
          await writeAtomically(file, contents);
        } catch (error) {
          logWithContext(logger, 'debug', 'credential location not writable', { path: file, code: errorCode(error) });
          continue;
        }
        record = next;
        activePath = file;
        logWithContext(logger, 'info', 'session token persisted', { path: file, sessionToken });
        return file;
      }

      record = next;
      logWithContext(logger, 'warn', 'session token kept in memory only: no writable credential location');
      return undefined;
    },

    location: () => activePath
  };
};
