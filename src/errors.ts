/* eslint-disable max-classes-per-file */
export class NetworkError extends Error {
  statusCode: number;
  constructor(message: string, statusCode: number) {
    super(message);
    this.statusCode = statusCode;
  }
}
export class InvalidResponseError extends Error {
  url: string;
  innerError?: Error;
  constructor(message: string, url: string, innerError?: Error) {
    super(message);
    this.url = url;
    this.innerError = innerError;
  }
}
export class CorruptCacheError extends Error {
  filePath: string;
  innerError?: Error;
  constructor(message: string, filePath: string, innerError?: Error) {
    super(message);
    this.filePath = filePath;
    this.innerError = innerError;
  }
}
export class ValidationError extends Error {
  item: string;
  innerError: Error;
  constructor(message: string, innerError: Error, item: string) {
    super(message);
    this.item = item;
    this.innerError = innerError;
  }
}
export class AuthorNotFoundError extends Error {
  authorName: string;
  modID: number;
  constructor(message: string, authorName: string, modID: number) {
    super(message);
    this.authorName = authorName;
    this.modID = modID;
  }
}
export class TimestampFormatError extends Error {
  value: string;
  innerError: Error;
  constructor(message: string, value: string, innerError: Error) {
    super(message);
    this.value = value;
    this.innerError = innerError;
  }
}
export class DuplicateRecordError extends Error {
  table: string;
  key: string;
  constructor(message: string, table: string, key: string) {
    super(message);
    this.table = table;
    this.key = key;
  }
}
