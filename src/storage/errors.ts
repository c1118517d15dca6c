export class StorageReadError extends Error {
  constructor(
    public readonly filePath: string,
    message: string
  ) {
    super(`${filePath}: ${message}`);
    this.name = 'StorageReadError';
  }
}

export class StorageWriteError extends Error {
  constructor(
    public readonly filePath: string,
    message: string
  ) {
    super(`${filePath}: ${message}`);
    this.name = 'StorageWriteError';
  }
}
