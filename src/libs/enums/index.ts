export * from './message.enum';
export * from './analyzer.enum';
