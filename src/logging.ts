/* eslint-disable no-console */

export enum LogLevel {
  DEBUG,
  INFO,
  WARN,
  ERROR
}

export interface Logger {
  write(level: LogLevel, message: string): void;
}

export function formatDateTime(date: Date): string {
  return `${date.getFullYear().toString().padStart(4, '0')}-${(date.getMonth() + 1).toString().padStart(2, '0')}-${date.getDate().toString().padStart(2, '0')} ${date.getHours().toString().padStart(2, '0')}:${date.getMinutes().toString().padStart(2, '0')}:${date.getSeconds().toString().padStart(2, '0')}:${date.getMilliseconds().toString().padStart(3, '0')}`;
}

function levelToString(level: LogLevel): string {
  switch (level) {
    case LogLevel.DEBUG:
      return 'DEBUG';
    case LogLevel.INFO:
      return 'INFO';
    case LogLevel.WARN:
      return 'WARN';
    case LogLevel.ERROR:
      return 'ERROR';
    default:
      return '';
  }
}

export function formatMessage(message: string | unknown): string {
  if (message instanceof Error) {
    return `${message.message}\nTrace\n${message.stack}`;
  }
  if (typeof message === 'string') {
    return message;
  }
  return JSON.stringify(message);
}

const loggers: Array<Logger> = [];
let logDebug = false;

export function setLogDebug(shouldLogDebug: boolean): void {
  logDebug = shouldLogDebug;
}

export function addLogger(logger: Logger): void {
  if (!loggers.includes(logger)) {
    loggers.push(logger);
  }
}

export function removeLogger(logger: Logger): void {
  const index = loggers.indexOf(logger);
  if (index !== -1) {
    loggers.splice(index, 1);
  }
}

export function write(level: LogLevel, ...messages: Array<string | unknown>): void {
  if (level === LogLevel.DEBUG && !logDebug) {
    return;
  }
  const formattedMessage = messages.map(formatMessage).join(' ');
  loggers.forEach((logger) => {
    logger.write(level, `${formatDateTime(new Date())}\t[${levelToString(level)}]\t${formattedMessage}`);
  });
}

export function debug(...messages: Array<string | unknown>): void {
  return write(LogLevel.DEBUG, ...messages);
}

export function info(...messages: Array<string | unknown>): void {
  return write(LogLevel.INFO, ...messages);
}

export function warn(...messages: Array<string | unknown>): void {
  return write(LogLevel.WARN, ...messages);
}

export function error(...messages: Array<string | unknown>): void {
  return write(LogLevel.ERROR, ...messages);
}

export const consoleLogger: Logger = {
  write(level: LogLevel, message: string): void {
    if (level >= LogLevel.WARN) {
      console.error(message);
    } else {
      console.log(message);
    }
  },
};
