export * from './fs-interface';
export * from './http-interface';
export * from './locator-interface';
export * from './process-interface';
export * from './progress-interface';
