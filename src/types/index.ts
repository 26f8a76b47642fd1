export * from './attr.type';
export * from './codec.type';
export * from './derive.type';
export * from './issue.type';
export * from './policy.type';
