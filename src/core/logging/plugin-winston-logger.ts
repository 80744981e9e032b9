// SPDX-License-Identifier: Apache-2.0

import * as winston from 'winston';
import {v4 as uuidv4} from 'uuid';
import * as util from 'node:util';
import chalk from 'chalk';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {PathEx} from '../../business/utils/path-ex.js';
import {type PluginLogger} from './plugin-logger.js';

const customFormat = winston.format.combine(
  winston.format.splat(),

  // include timestamp in logs
  winston.format.timestamp(),

  winston.format.ms(),

  // convert levels to upper case
  winston.format(data => {
    data.level = data.level.toUpperCase();
    return data;
  })(),

  // use custom format TIMESTAMP|LEVEL| MESSAGE
  winston.format.printf(data => `${data.timestamp}|${data.level}| ${data.message}`),

  // Ignore log messages if they have { private: true }
  winston.format(data => (data.private ? false : data))(),
);

interface StackEntry {
  message: string;
  stacktrace: string;
}

@injectable()
export class PluginWinstonLogger implements PluginLogger {
  private readonly winstonLogger: winston.Logger;
  private traceId?: string;
  private developmentMode: boolean;

  /**
   * @param logLevel - the log level to use
   * @param developmentMode - if true, show full stack traces in error messages
   * @param logsDirectory - the directory receiving helm-outdated.log
   */
  public constructor(
    @inject(InjectTokens.LogLevel) logLevel?: string,
    @inject(InjectTokens.DevelopmentMode) developmentMode?: boolean,
    @inject(InjectTokens.LogsDirectory) logsDirectory?: string,
  ) {
    const level: string = patchInject(logLevel, InjectTokens.LogLevel, this.constructor.name);
    this.developmentMode = patchInject(developmentMode, InjectTokens.DevelopmentMode, this.constructor.name);
    const directory: string = patchInject(logsDirectory, InjectTokens.LogsDirectory, this.constructor.name);

    this.nextTraceId();

    this.winstonLogger = winston.createLogger({
      level,
      format: winston.format.combine(customFormat, winston.format.json()),
      transports: [new winston.transports.File({filename: PathEx.join(directory, 'helm-outdated.log')})],
    });
  }

  public setDevMode(developmentMode: boolean): void {
    this.debug(`dev mode logging: ${developmentMode}`);
    this.developmentMode = developmentMode;
  }

  public nextTraceId(): void {
    this.traceId = uuidv4();
  }

  public prepMeta(meta: Record<string, unknown> = {}): Record<string, unknown> {
    meta.traceId = this.traceId;
    return meta;
  }

  public showUser(message: unknown, ...arguments_: unknown[]): void {
    console.log(util.format(message, ...arguments_));
    this.info(util.format(message, ...arguments_));
  }

  public showWarning(message: string): void {
    console.error(chalk.yellow(`WARNING: ${message}`));
    this.warn(message);
  }

  public showUserError(error: unknown): void {
    const stack: StackEntry[] = [];
    let cause: unknown = error;
    let depth = 0;
    while (cause instanceof Error && depth < 10) {
      stack.push({message: cause.message, stacktrace: cause.stack ?? ''});
      cause = cause.cause;
      depth += 1;
    }
    const message: string = error instanceof Error ? error.message : String(error);

    console.error(chalk.red('*********************************** ERROR *****************************************'));
    if (this.developmentMode) {
      let prefix = '';
      let indent = '';
      for (const s of stack) {
        console.error(indent + prefix + chalk.yellow(s.message));
        // Remove everything after the first "Caused by: " and add indentation
        const formattedStacktrace = s.stacktrace
          .replace(/Caused by:.*/s, '')
          .replace(/\n\s*/g, '\n' + indent)
          .trim();
        console.error(indent + chalk.gray(formattedStacktrace) + '\n');
        indent += '  ';
        prefix = 'Caused by: ';
      }
    } else {
      for (const line of message.split('\n')) {
        console.error(chalk.yellow(line));
      }
    }
    console.error(chalk.red('***********************************************************************************'));

    this.error(message, error);
  }

  public error(message: unknown, ...arguments_: unknown[]): void {
    this.winstonLogger.error(String(message), ...arguments_, this.prepMeta());
  }

  public warn(message: unknown, ...arguments_: unknown[]): void {
    this.winstonLogger.warn(String(message), ...arguments_, this.prepMeta());
  }

  public info(message: unknown, ...arguments_: unknown[]): void {
    this.winstonLogger.info(String(message), ...arguments_, this.prepMeta());
  }

  public debug(message: unknown, ...arguments_: unknown[]): void {
    this.winstonLogger.debug(String(message), ...arguments_, this.prepMeta());
  }
}
