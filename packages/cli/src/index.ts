/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @stb-ifc/cli - command bodies behind the stb-ifc executable
 */

export {
  convertCommand,
  compareCommand,
  configCommand,
  resolveConfig,
  defaultOutputPath,
  type CommandResult,
  type ConfigOptions,
  type ConvertOptions,
  type ConvertCommandResult,
} from './commands.js';
