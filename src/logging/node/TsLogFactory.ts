import path from 'path';
import { ISettingsParam, Logger } from 'tslog';
import { ContractLogger } from '../ContractLogger';
import { ILoggerFactory } from '../LoggerFactory';
import { LogLevel } from '../LoggerSettings';

export const defaultLoggerOptions: ISettingsParam = {
  displayFunctionName: false,
  displayFilePath: 'hidden',
  displayLoggerName: true,
  dateTimeTimezone: Intl.DateTimeFormat().resolvedOptions().timeZone,
  minLevel: 'debug',
  overwriteConsole: false
};

// '__filename' works as a module name - only the base name without extension is kept
const moduleOf = (name: string): string => path.basename(name, path.extname(name));

/**
 * Loggers backed by "tslog". Settings can be changed at run time, for a single module
 * or for all of them. Settings of a module given before its logger exists are used to create it.
 */
export class TsLogFactory implements ILoggerFactory {
  private readonly loggers = new Map<string, Logger>();
  private readonly pendingOptions = new Map<string, ISettingsParam>();

  private defaultOptions: ISettingsParam = { ...defaultLoggerOptions };

  setOptions(newOptions: ISettingsParam, moduleName?: string): void {
    if (!moduleName) {
      this.defaultOptions = { ...this.defaultOptions, ...newOptions };
      this.loggers.forEach((logger) => logger.setSettings({ ...logger.settings, ...newOptions }));
      return;
    }
    const module = moduleOf(moduleName);
    const logger = this.loggers.get(module);
    if (logger) {
      logger.setSettings({ ...logger.settings, ...newOptions });
    } else {
      this.pendingOptions.set(module, { ...this.getOptions(module), ...newOptions });
    }
  }

  getOptions(moduleName?: string): ISettingsParam {
    if (!moduleName) {
      return this.defaultOptions;
    }
    const module = moduleOf(moduleName);
    return this.loggers.get(module)?.settings ?? this.pendingOptions.get(module) ?? this.defaultOptions;
  }

  logLevel(level: LogLevel, moduleName?: string): void {
    this.setOptions({ minLevel: level }, moduleName);
  }

  create(moduleName = 'ContractWrapper'): ContractLogger {
    const module = moduleOf(moduleName);
    let logger = this.loggers.get(module);
    if (!logger) {
      logger = new Logger({ ...this.getOptions(module), name: module });
      this.loggers.set(module, logger);
      this.pendingOptions.delete(module);
    }
    return logger;
  }
}
