import { ContractLogger } from '../ContractLogger';
import { ILoggerFactory } from '../LoggerFactory';
import { LoggerSettings, LogLevel } from '../LoggerSettings';
import { ConsoleLogger } from './ConsoleLogger';

export const defaultConsoleLoggerSettings: LoggerSettings = {
  minLevel: 'info'
};

/**
 * Default logger factory - writes through the global `console`,
 * keeps a separate {@link LoggerSettings} for every registered module.
 */
export class ConsoleLoggerFactory implements ILoggerFactory {
  private readonly loggers = new Map<string, ConsoleLogger>();
  private readonly pendingOptions = new Map<string, LoggerSettings>();

  private defaultOptions: LoggerSettings = { ...defaultConsoleLoggerSettings };

  setOptions(newOptions: Partial<LoggerSettings>, moduleName?: string): void {
    if (!moduleName) {
      this.defaultOptions = { ...this.defaultOptions, ...newOptions };
      this.loggers.forEach((logger) => logger.setSettings({ ...logger.settings, ...newOptions }));
      return;
    }
    const logger = this.loggers.get(moduleName);
    if (logger) {
      logger.setSettings({ ...logger.settings, ...newOptions });
    } else {
      this.pendingOptions.set(moduleName, { ...this.getOptions(moduleName), ...newOptions });
    }
  }

  getOptions(moduleName?: string): LoggerSettings {
    if (!moduleName) {
      return this.defaultOptions;
    }
    return this.loggers.get(moduleName)?.settings ?? this.pendingOptions.get(moduleName) ?? this.defaultOptions;
  }

  logLevel(level: LogLevel, moduleName?: string): void {
    this.setOptions({ minLevel: level }, moduleName);
  }

  create(moduleName = 'ContractWrapper'): ContractLogger {
    let logger = this.loggers.get(moduleName);
    if (!logger) {
      logger = new ConsoleLogger(moduleName, { ...this.getOptions(moduleName) });
      this.loggers.set(moduleName, logger);
      this.pendingOptions.delete(moduleName);
    }
    return logger;
  }
}
