export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandExecutor {
  // Human-readable description of where commands run, e.g. "ssh root@web1"
  readonly target: string;

  exec(command: string): Promise<CommandResult>;
  close(): Promise<void>;

  // Stream output chunks as they arrive (optional - not all executors may support)
  execStreaming?(command: string, onOutput: (chunk: string) => void): Promise<CommandResult>;
}

export type ExecutorTarget =
  | { type: 'local' }
  | { type: 'ssh'; host: string; port?: number; user?: string; keyPath?: string }
  | { type: 'docker'; container: string; user?: string }
  | { type: 'ssm'; instanceId: string; region: string; user?: string };
