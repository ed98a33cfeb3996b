export * from './course';
export * from './progress';
export * from './entity';
export * from './action';
export * from './download';
export * from './cache';
export * from './sync';
