export class FetchFailureError extends Error {
  constructor(public readonly url: string, public readonly status: number, statusText = '') {
    super(`Could not retrieve error docs from ${url}: HTTP ${status}${statusText ? ` ${statusText}` : ''}`);
    this.name = 'FetchFailureError';
  }
}

export class EmptyResponseError extends Error {
  constructor(public readonly url: string) {
    super(`Empty error docs returned by ${url}`);
    this.name = 'EmptyResponseError';
  }
}

export class OutputPathError extends Error {
  constructor(public readonly outputPath: string) {
    super(`Output path ${outputPath} exists and is not a regular file`);
    this.name = 'OutputPathError';
  }
}
