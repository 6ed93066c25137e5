import type { CommandExecutor, CommandResult } from './executor-interface.js';
import { runProcess } from './process.js';

export class LocalExecutor implements CommandExecutor {
  readonly target = 'local';

  exec(command: string): Promise<CommandResult> {
    return runProcess('sh', ['-c', command]);
  }

  execStreaming(command: string, onOutput: (chunk: string) => void): Promise<CommandResult> {
    return runProcess('sh', ['-c', command], { onOutput });
  }

  async close(): Promise<void> {
    // Nothing to clean up for per-command shells
  }
}
