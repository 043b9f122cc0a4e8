export * from './error.schema';
export * from './kline.schema';
export * from './control.schema';
