// Constants for sourcefetch

export const PROGRAM_NAME = 'sourcefetch';
export const VERSION = '0.1.0';

export const SOURCEFETCH_DIR = '.sourcefetch';
export const CONFIG_FILE = 'config.json';

export const INTERRUPT_MESSAGE = 'Received Ctrl-C or other break signal. Exiting.';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
