import type { CommandResult, CommandExecutor, ExecutorTarget } from './executor-interface.js';
import { runProcess } from './process.js';

type DockerTarget = Extract<ExecutorTarget, { type: 'docker' }>;

export class DockerExecutor implements CommandExecutor {
  readonly target: string;

  constructor(private readonly docker: DockerTarget) {
    this.target = `docker ${docker.container}`;
  }

  dockerArgs(command: string): string[] {
    const args = ['exec'];
    if (this.docker.user) {
      args.push('-u', this.docker.user);
    }
    args.push(this.docker.container, 'sh', '-c', command);
    return args;
  }

  exec(command: string): Promise<CommandResult> {
    return runProcess('docker', this.dockerArgs(command));
  }

  execStreaming(command: string, onOutput: (chunk: string) => void): Promise<CommandResult> {
    return runProcess('docker', this.dockerArgs(command), { onOutput });
  }

  async close(): Promise<void> {
    // Nothing to clean up for per-command exec
  }
}
