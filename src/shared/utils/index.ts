export * from './textSplice';
export * from './kindCap';
