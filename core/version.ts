export const EDITOR_NAME = 'Gridpad';
export const VERSION = '0.1.0';
