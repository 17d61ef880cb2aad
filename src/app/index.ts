/**
 * Application Entry Point
 *
 * Composition root shared by the invocation handler and the CLI.
 */

import { createContainer, type ContainerConfigOverrides, type DepsOverrides } from './container';
import { createController, type Controller } from './controller';

export function bootstrap(
  configOverrides: ContainerConfigOverrides = {},
  depsOverrides: DepsOverrides = {},
): Controller {
  const deps = createContainer(configOverrides, depsOverrides);
  return createController(deps);
}

export { createContainer, cachedConnection } from './container';
export type { Deps, ContainerConfigOverrides, ContainerEnvironment, DepsOverrides } from './container';
export { createController } from './controller';
export type { Controller, ControllerDeps } from './controller';
