import type { CommandResult, CommandExecutor, ExecutorTarget } from './executor-interface.js';
import { runProcess } from './process.js';

type SshTarget = Extract<ExecutorTarget, { type: 'ssh' }>;

export class SSHExecutor implements CommandExecutor {
  readonly target: string;
  private readonly baseArgs: string[];

  constructor(ssh: SshTarget) {
    const destination = ssh.user ? `${ssh.user}@${ssh.host}` : ssh.host;
    this.target = `ssh ${destination}`;

    this.baseArgs = [
      '-o', 'StrictHostKeyChecking=no',
      '-o', 'UserKnownHostsFile=/dev/null',
      '-o', 'BatchMode=yes',
    ];

    if (ssh.port) {
      this.baseArgs.push('-p', String(ssh.port));
    }

    if (ssh.keyPath) {
      this.baseArgs.push('-i', ssh.keyPath);
    }

    this.baseArgs.push(destination);
  }

  sshArgs(command: string): string[] {
    return [...this.baseArgs, command];
  }

  exec(command: string): Promise<CommandResult> {
    return runProcess('ssh', this.sshArgs(command));
  }

  execStreaming(command: string, onOutput: (chunk: string) => void): Promise<CommandResult> {
    return runProcess('ssh', this.sshArgs(command), { onOutput });
  }

  async close(): Promise<void> {
    // Nothing to clean up for per-command SSH
  }
}
