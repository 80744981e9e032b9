#!/usr/bin/env node
// SPDX-License-Identifier: Apache-2.0

import sourceMapSupport from 'source-map-support';
sourceMapSupport.install(); // Enable source maps for error stack traces
import * as plugin from './src/index.js';
import {type PluginLogger} from './src/core/logging/plugin-logger.js';
import {InjectTokens} from './src/core/dependency-injection/inject-tokens.js';
import {container} from 'tsyringe-neo';
import {type ErrorHandler} from './src/core/error-handler.js';

const context: {logger?: PluginLogger} = {};
await plugin
  .main(process.argv, context)
  .then(() => {
    context.logger?.info('helm outdated completed, via entrypoint');
  })
  .catch((error: unknown) => {
    if (!container.isRegistered(InjectTokens.ErrorHandler)) {
      console.error(error);
      process.exitCode = 1;
      return;
    }
    const errorHandler: ErrorHandler = container.resolve(InjectTokens.ErrorHandler);
    errorHandler.handle(error);
  });
