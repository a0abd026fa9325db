export * from './injectionGate';
export * from './keymap';
export * from './types';
