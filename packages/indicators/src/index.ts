export * from './rsi';
