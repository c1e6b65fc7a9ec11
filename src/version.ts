export const NAME = 'promptgate';
export const VERSION = '0.3.0';
