const usage = 'Usage: load-tables [--unload] [--file <path>] [--sheet <name>]';

export interface LoadOptions {
  unload: boolean;
  file: string;
  sheet: string;
}

export const parseArgs = (argv: string[], defaults: { file: string; sheet: string }): LoadOptions => {
  const options: LoadOptions = { unload: false, ...defaults };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case '--unload':
        options.unload = true;
        break;
      case '--file':
      case '--sheet': {
        const value = argv[i + 1];
        if (value === undefined || value.startsWith('--')) {
          throw new Error(`${arg} requires a value. ${usage}`);
        }
        if (arg === '--file') {
          options.file = value;
        } else {
          options.sheet = value;
        }
        i += 1;
        break;
      }
      default:
        throw new Error(`Unknown argument ${arg}. ${usage}`);
    }
  }

  return options;
};
