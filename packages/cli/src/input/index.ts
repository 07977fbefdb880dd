export * from './prompter';
export * from './resolver';
export * from './confirm';
