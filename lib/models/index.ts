export * from './download';
export * from './install';
export * from './process';
export * from './ui';
export * from './update';
export * from './version';
