export const CLI_NAME = 'termfix';
export const CLI_VERSION = '0.3.0';
