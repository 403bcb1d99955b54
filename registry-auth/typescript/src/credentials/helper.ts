/**
 * Docker credential helper protocol.
 *
 * A helper is an executable named `docker-credential-<name>`. The `get`
 * action reads a server address on stdin and writes a JSON document with
 * `Username` and `Secret` on stdout.
 *
 * @module credentials/helper
 */

import { spawn } from 'child_process';
import { z } from 'zod';
import type { AuthConfig, Authenticator } from '../auth/authenticator.js';
import { RegistryAuthError } from '../errors.js';

/**
 * Prefix of credential helper executables.
 */
export const HELPER_PREFIX = 'docker-credential-';

/**
 * Username a helper returns when the secret is an identity token.
 */
export const IDENTITY_TOKEN_USERNAME = '<token>';

/**
 * Message helpers print when they hold no credentials for a server.
 */
const CREDENTIALS_NOT_FOUND = 'credentials not found in native keychain';

/**
 * Output of a finished helper process.
 */
export interface HelperProcessResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Runs a helper program with the given arguments and stdin.
 */
export type HelperRunner = (
  program: string,
  args: string[],
  input: string
) => Promise<HelperProcessResult>;

const HelperOutputSchema = z.object({
  ServerURL: z.string().optional(),
  Username: z.string(),
  Secret: z.string(),
});

/**
 * Default runner backed by child_process.spawn.
 */
export const spawnHelper: HelperRunner = (program, args, input) =>
  new Promise<HelperProcessResult>((resolve, reject) => {
    const proc = spawn(program, args, { stdio: ['pipe', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';

    proc.stdout.setEncoding('utf-8');
    proc.stderr.setEncoding('utf-8');
    proc.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    proc.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    proc.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'ENOENT') {
        reject(RegistryAuthError.helperNotFound(program, error));
      } else {
        reject(RegistryAuthError.helperFailed(program, error.message, error));
      }
    });

    proc.on('close', (code) => {
      resolve({ stdout, stderr, exitCode: code ?? 1 });
    });

    proc.stdin.on('error', () => {
      // Helper exited without reading stdin; its exit status and output decide the result
    });
    proc.stdin.end(input);
  });

/**
 * Authenticator that asks an external credential helper on every call.
 */
export class CredentialHelperAuthenticator implements Authenticator {
  readonly helper: string;
  readonly serverAddress: string;
  private readonly run: HelperRunner;

  constructor(helper: string, serverAddress: string, run: HelperRunner = spawnHelper) {
    this.helper = helper;
    this.serverAddress = serverAddress;
    this.run = run;
  }

  /**
   * Full name of the helper executable.
   */
  get program(): string {
    return `${HELPER_PREFIX}${this.helper}`;
  }

  async authorization(): Promise<AuthConfig> {
    const result = await this.run(this.program, ['get'], this.serverAddress);
    const stdout = result.stdout.trim();

    if (result.exitCode !== 0) {
      if (stdout.includes(CREDENTIALS_NOT_FOUND)) {
        return {};
      }
      const reason = result.stderr.trim() || stdout || `exit code ${result.exitCode}`;
      throw RegistryAuthError.helperFailed(this.program, reason);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(stdout);
    } catch {
      throw RegistryAuthError.helperFailed(this.program, 'output is not valid JSON');
    }

    const parsed = HelperOutputSchema.safeParse(raw);
    if (!parsed.success) {
      throw RegistryAuthError.helperFailed(this.program, 'output is missing Username or Secret');
    }

    const { Username, Secret } = parsed.data;
    if (Username === IDENTITY_TOKEN_USERNAME) {
      return { identityToken: Secret };
    }
    return { username: Username, password: Secret };
  }

  toString(): string {
    return `CredentialHelperAuthenticator(${this.program}, ${this.serverAddress})`;
  }
}
