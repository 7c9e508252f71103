import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { tryCanonicalMac, type SafeLogger } from '@lanwarden/gateway';
import { ScanFailure } from '../../domain/errors';

export type ScanResult = { ok: true; macs: Set<string> } | { ok: false; failure: ScanFailure };

export interface Scanner {
  scan(): Promise<ScanResult>;
}

export type ExecFn = (
  file: string,
  args: readonly string[],
  options: { timeout: number; maxBuffer: number }
) => Promise<{ stdout: string; stderr: string }>;

const execFileAsync = promisify(execFile);

export const defaultExec: ExecFn = (file, args, options) =>
  execFileAsync(file, [...args], { ...options, encoding: 'utf8' });

export interface ArpScannerOptions {
  command: string;
  args: readonly string[];
  interfaceName: string;
  timeoutMs: number;
  exec?: ExecFn;
  logger?: SafeLogger;
}

interface ExecFailure {
  killed?: boolean;
  signal?: string | null;
  code?: number | string | null;
}

const isExecFailure = (error: unknown): error is Error & ExecFailure => error instanceof Error;

const MAX_BUFFER_CODE = 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER';
const MAX_BUFFER = 4 * 1024 * 1024;

const IPV4 = /^\d{1,3}(\.\d{1,3}){3}$/;

/**
 * Extracts MACs from discovery output. Lines that do not start with an IPv4 address (banners,
 * summaries) are ignored; a line that does but carries no valid MAC makes the whole scan invalid.
 */
export const parseScanOutput = (stdout: string): Set<string> | { malformedLine: string } => {
  const macs = new Set<string>();
  for (const line of stdout.split(/\r?\n/)) {
    const fields = line.trim().split(/\s+/);
    if (!fields[0] || !IPV4.test(fields[0])) {
      continue;
    }
    const mac = tryCanonicalMac(fields[1]);
    if (!mac) {
      return { malformedLine: line.trim() };
    }
    macs.add(mac);
  }
  return macs;
};

export const createArpScanner = ({
  command,
  args,
  interfaceName,
  timeoutMs,
  exec = defaultExec,
  logger
}: ArpScannerOptions): Scanner => {
  const argv = args.map((arg) => arg.replace('{interface}', interfaceName));

  const fail = (failure: ScanFailure): ScanResult => {
    logger?.warn?.({ reason: failure.reason, ...failure.metadata }, failure.message);
    return { ok: false, failure };
  };

  return {
    async scan() {
      let stdout: string;
      try {
        ({ stdout } = await exec(command, argv, { timeout: timeoutMs, maxBuffer: MAX_BUFFER }));
      } catch (error) {
        if (isExecFailure(error) && error.code === MAX_BUFFER_CODE) {
          return fail(new ScanFailure('exec_failed', 'network scan output exceeded the buffer', { command, code: error.code }, error));
        }
        if (isExecFailure(error) && (error.killed || error.signal === 'SIGTERM')) {
          return fail(new ScanFailure('timeout', 'network scan timed out', { command, timeoutMs }, error));
        }
        const code = isExecFailure(error) ? error.code : undefined;
        return fail(new ScanFailure('exec_failed', 'network scan failed', { command, code }, error));
      }

      const parsed = parseScanOutput(stdout);
      if (!(parsed instanceof Set)) {
        return fail(new ScanFailure('malformed_output', 'network scan output is malformed', { line: parsed.malformedLine }));
      }
      logger?.debug?.({ devices: parsed.size }, 'network scan complete');
      return { ok: true, macs: parsed };
    }
  };
};
