export * from './answers/client';
export * from './answers/models';
export * from './answers/types';
export * from './command/engine';
export * from './command/queue';
export * from './command/quotes';
export * from './command/router';
export * from './command/triggers';
export * from './command/types';
export * from './domain/migrations';
export * from './domain/schemas';
export * from './repositories/types';
export * from './session/controller';
export * from './session/types';
