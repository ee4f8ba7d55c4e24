import prompts from 'prompts';
import type { CredentialPrompter, PromptOutcome } from './types.js';

export interface TerminalPrompterOptions {
  minLength: number;
  /** False when stdin already carries the protocol (stdio transport). */
  enabled?: boolean;
  input?: NodeJS.ReadStream;
  output?: NodeJS.WriteStream;
}

/**
 * Reads an API key and token from the controlling terminal. Output goes to
 * stderr so stdout stays reserved for protocol traffic.
 */
export class TerminalPrompter implements CredentialPrompter {
  private readonly minLength: number;
  private readonly enabled: boolean;
  private readonly input: NodeJS.ReadStream;
  private readonly output: NodeJS.WriteStream;

  constructor(options: TerminalPrompterOptions) {
    this.minLength = options.minLength;
    this.enabled = options.enabled ?? true;
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stderr;
  }

  async promptForPair(loginUrl: string): Promise<PromptOutcome> {
    if (!this.enabled) {
      return { status: 'unavailable', reason: 'interactive login is not possible over the stdio transport' };
    }
    if (!this.input.isTTY) {
      return { status: 'unavailable', reason: 'no interactive terminal attached' };
    }

    const rule = '='.repeat(60);
    this.output.write(
      `\n${rule}\n🔐 TRELLO LOGIN REQUIRED\n${rule}\n\n` +
      `1. Open ${loginUrl}\n` +
      '2. Copy your API Key (shown at the top)\n' +
      "3. Follow the 'Token' link to generate a token\n" +
      '4. Paste both values below\n\n'
    );

    const validate = (label: string) => (value: string) =>
      value.trim().length >= this.minLength || `${label} should be at least ${this.minLength} characters`;

    let cancelled = false;
    const answers = await prompts(
      [
        {
          type: 'text',
          name: 'apiKey',
          message: '📋 Trello API Key',
          validate: validate('API key'),
          stdin: this.input,
          stdout: this.output,
        },
        {
          type: 'password',
          name: 'token',
          message: '🔑 Trello Token',
          validate: validate('Token'),
          stdin: this.input,
          stdout: this.output,
        },
      ],
      {
        onCancel: () => {
          cancelled = true;
          return false;
        },
      }
    );

    const apiKey: unknown = answers.apiKey;
    const token: unknown = answers.token;
    if (cancelled || typeof apiKey !== 'string' || typeof token !== 'string') {
      return { status: 'aborted' };
    }

    this.output.write(`\n✅ Credentials received and cached for this session\n${rule}\n\n`);
    return { status: 'provided', pair: { apiKey, token } };
  }
}
