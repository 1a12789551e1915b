import chalk from 'chalk';

export interface Logger {
  warning: (msg: string) => void;
  debug: (msg: string) => void;
}

export const logger: Logger = {
  warning: (msg: string) => {
    console.log(chalk.yellow('⚠'), msg);
  },

  debug: (msg: string) => {
    if (process.env.DEBUG) {
      console.log(chalk.gray('⚙'), chalk.gray(msg));
    }
  },
};

export const formatPath = (path: string): string => {
  return chalk.cyan(path);
};

export const formatCount = (count: number, singular: string, plural?: string): string => {
  const word = count === 1 ? singular : (plural || `${singular}s`);
  return `${chalk.bold(count.toString())} ${word}`;
};
