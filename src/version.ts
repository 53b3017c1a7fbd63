export const NAME = 'mell';
export const VERSION = '0.1.0';
