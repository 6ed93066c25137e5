import type { ResourceProvider } from '../resource.js';
import { commandProvider } from './command.js';
import { fileProvider } from './file.js';
import { interfaceProvider } from './interface.js';
import { packageProvider } from './package.js';
import { serviceProvider } from './service.js';
import { socketProvider } from './socket.js';
import { systemInfoProvider } from './system-info.js';

export const builtinProviders: readonly ResourceProvider[] = [
  packageProvider,
  serviceProvider,
  fileProvider,
  socketProvider,
  commandProvider,
  interfaceProvider,
  systemInfoProvider,
];

export { Package, DebianPackage, RpmPackage } from './package.js';
export { Service, SystemdService, SysvService } from './service.js';
export { File } from './file.js';
export { Socket, parseSocketSpec, type SocketSpec } from './socket.js';
export { Command } from './command.js';
export { Interface } from './interface.js';
export { SystemInfo } from './system-info.js';
export {
  commandProvider,
  fileProvider,
  interfaceProvider,
  packageProvider,
  serviceProvider,
  socketProvider,
  systemInfoProvider,
};
