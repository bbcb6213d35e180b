export * from './parameter-tree.interface';
export * from './service-config.interface';
export * from './composition.interface';
export * from './module-options.interface';
export * from './module-async-options.interface';
