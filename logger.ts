import chalk from 'chalk';

export enum Level {
  notset = 0,
  debug = 10,
  info = 20,
  warning = 30,
  error = 40,
  critical = 50,
}

const levelNames: {[name: string]: Level} = {
  notset: Level.notset,
  debug: Level.debug,
  info: Level.info,
  warning: Level.warning,
  error: Level.error,
  critical: Level.critical,
};

/**
Look up a level by name, as given on the command line.
*/
export function parseLevel(name: string): Level {
  const level = levelNames[name.toLowerCase()];
  if (level === undefined) {
    throw new Error(`Unknown log level "${name}"; expected one of ${Object.keys(levelNames).join(', ')}`);
  }
  return level;
}

function paintLabel(level: Level, label: string): string {
  if (level >= Level.error) {
    return chalk.red(label);
  }
  if (level >= Level.warning) {
    return chalk.yellow(label);
  }
  return level >= Level.info ? chalk.cyan(label) : chalk.gray(label);
}

export type LogSink = (line: string) => void;

/**
Writes one line per message, `[level] message`, to stderr by default, so that
stdout carries only command output. Labels are coloured when `colors` is
set, which by default follows chalk's terminal detection.
*/
export class Logger {
  constructor(public level: Level = Level.notset,
              private sink: LogSink = line => console.error(line),
              public colors: boolean = chalk.supportsColor !== false) { }

  log(level: Level, message: unknown, ...optionalParams: unknown[]): void {
    if (level < this.level) {
      return;
    }
    const label = `[${Level[level]}]`;
    const text = [message, ...optionalParams].map(String).join(' ');
    this.sink(`${this.colors ? paintLabel(level, label) : label} ${text}`);
  }

  debug(message: unknown, ...optionalParams: unknown[]): void {
    return this.log(Level.debug, message, ...optionalParams);
  }
  info(message: unknown, ...optionalParams: unknown[]): void {
    return this.log(Level.info, message, ...optionalParams);
  }
  warning(message: unknown, ...optionalParams: unknown[]): void {
    return this.log(Level.warning, message, ...optionalParams);
  }
  error(message: unknown, ...optionalParams: unknown[]): void {
    return this.log(Level.error, message, ...optionalParams);
  }
  critical(message: unknown, ...optionalParams: unknown[]): void {
    return this.log(Level.critical, message, ...optionalParams);
  }
}

export const logger = new Logger(Level.info);
