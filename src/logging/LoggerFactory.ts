import { ContractLogger } from './ContractLogger';
import { LogLevel } from './LoggerSettings';
import { ConsoleLoggerFactory } from './web/ConsoleLoggerFactory';

export interface ILoggerFactory {
  setOptions(newOptions: unknown, moduleName?: string): void;

  getOptions(moduleName?: string): unknown;

  logLevel(level: LogLevel, moduleName?: string): void;

  create(moduleName?: string): ContractLogger;
}

/**
 * Holds the factory every logger of the library is created with.
 * Replace it (e.g. with a `TsLogFactory`) before the loggers are created.
 */
export class LoggerFactory {
  static INST: ILoggerFactory = new ConsoleLoggerFactory();

  static use(factory: ILoggerFactory): void {
    LoggerFactory.INST = factory;
  }
}
