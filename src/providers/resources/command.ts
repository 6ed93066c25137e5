import { z } from 'zod';
import type { Backend } from '../backend.js';
import { Resource, backendOf, bindHandle, type ResourceOptions, type ResourceProvider } from '../resource.js';
import type { CommandResult } from '../../runner/executor-interface.js';
import { shellEscape } from '../../lib/shell.js';

const CommandOptionsSchema = z.object({
  cwd: z.string().min(1).optional(),
});

/** The outcome of running a shell command once on the target. */
export class Command extends Resource {
  static readonly parameters: readonly string[] = ['command', 'cwd'];

  readonly cwd: string | undefined;
  #result: Promise<CommandResult> | null = null;

  constructor(
    backend: Backend,
    readonly command: string,
    options: ResourceOptions = {},
  ) {
    super(backend);
    this.cwd = CommandOptionsSchema.parse(options).cwd;
  }

  get rc(): Promise<number> {
    return this.#run().then(result => result.exitCode);
  }

  get stdout(): Promise<string> {
    return this.#run().then(result => result.stdout);
  }

  get stderr(): Promise<string> {
    return this.#run().then(result => result.stderr);
  }

  get succeeded(): Promise<boolean> {
    return this.#run().then(result => result.exitCode === 0);
  }

  get failed(): Promise<boolean> {
    return this.#run().then(result => result.exitCode !== 0);
  }

  stdoutContains(text: unknown): Promise<boolean> {
    return this.#run().then(result => result.stdout.includes(String(text)));
  }

  #run(): Promise<CommandResult> {
    if (!this.#result) {
      const command = this.cwd ? `cd ${shellEscape(this.cwd)} && ${this.command}` : this.command;
      this.#result = backendOf(this).run(command);
    }
    return this.#result;
  }
}

export const commandProvider: ResourceProvider = {
  name: 'Command',
  description: 'Exit status and output of a shell command',

  async resolve(backend: Backend) {
    return bindHandle('Command', backend, Command);
  },
};
