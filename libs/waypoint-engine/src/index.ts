export * from './lib/codec';
export * from './lib/errors';
export * from './lib/router';
export * from './lib/sequencer';
export * from './lib/session';
export * from './lib/step';
export * from './lib/validate';
export * from './lib/workflow';
