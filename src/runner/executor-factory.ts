import type { CommandExecutor, ExecutorTarget } from './executor-interface.js';
import { DockerExecutor } from './docker-executor.js';
import { LocalExecutor } from './local-executor.js';
import { SSHExecutor } from './ssh-executor.js';
import { SSMSessionExecutor } from './ssm-session-executor.js';

export function createExecutor(target: ExecutorTarget): CommandExecutor {
  switch (target.type) {
    case 'local':
      return new LocalExecutor();
    case 'ssh':
      return new SSHExecutor(target);
    case 'docker':
      return new DockerExecutor(target);
    case 'ssm':
      return new SSMSessionExecutor(target);
  }
}
