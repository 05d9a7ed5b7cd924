export * from './all-exceptions.filter';
export * from './errors';
export * from './financial-ratios';
