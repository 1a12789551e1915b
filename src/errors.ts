import chalk from 'chalk';

export class CredentialsError extends Error {
  constructor(
    message: string,
    public code: string,
    public suggestions?: string[],
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CredentialsError';
  }
}

export class FileNotReadableError extends CredentialsError {
  constructor(
    public path: string,
    cause?: unknown
  ) {
    super(
      `Cannot read credentials file: ${path}`,
      'FILE_NOT_READABLE',
      ['Check that the path is correct', 'Check that the file is readable by the current user'],
      { cause }
    );
  }
}

export class ParseError extends CredentialsError {
  constructor(
    message: string,
    public line?: number,
    cause?: unknown
  ) {
    super(
      line === undefined ? `Failed to parse: ${message}` : `Failed to parse line ${line}: ${message}`,
      'PARSE_ERROR',
      ['Fix or remove the offending line', 'Load without strict mode to skip unrecognized lines'],
      { cause }
    );
  }
}

export class WriteError extends CredentialsError {
  constructor(
    public path: string,
    cause?: unknown
  ) {
    super(
      `Cannot write credentials file: ${path}`,
      'WRITE_FAILED',
      ['Check that the parent directory exists', 'Check file permissions'],
      { cause }
    );
  }
}

export class PlatformError extends CredentialsError {
  constructor(message: string, cause?: unknown) {
    super(
      `Cannot resolve home directory: ${message}`,
      'PLATFORM_ERROR',
      ['Set the HOME environment variable', 'Load the credentials file from an explicit path'],
      { cause }
    );
  }
}

export class InvalidProfileNameError extends CredentialsError {
  constructor(name: string) {
    super(`Invalid profile name: '${name}'`, 'INVALID_PROFILE_NAME', [
      'Profile names must not be empty',
    ]);
  }
}

export class InvalidCredentialsError extends CredentialsError {
  constructor(message: string) {
    super(`Invalid credentials: ${message}`, 'INVALID_CREDENTIALS');
  }
}

export class ConfigError extends CredentialsError {
  constructor(message: string) {
    super(`Configuration error: ${message}`, 'CONFIG_ERROR', [
      'fileMode must be an integer permission mask such as 0o600',
    ]);
  }
}

export const formatError = (error: unknown): string => {
  if (error instanceof CredentialsError) {
    const lines = [`${chalk.red('x')} ${error.message}`];
    if (error.suggestions && error.suggestions.length > 0) {
      lines.push('', chalk.dim('Suggestions:'));
      error.suggestions.forEach((s) => lines.push(chalk.dim(`  → ${s}`)));
    }
    return lines.join('\n');
  }

  if (error instanceof Error) {
    return `${chalk.red('x')} An unexpected error occurred: ${error.message}`;
  }

  return `${chalk.red('x')} An unknown error occurred`;
};
