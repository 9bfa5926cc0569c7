export * from './common';
export * from './stock';
export * from './chart';
export * from './fund';
export * from './search';
export * from './filter';
export * from './certificate';
export * from './warrant';
export * from './etf';
export * from './futureForward';
export * from './instrumentData';
