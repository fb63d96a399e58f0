export * from './autoscaling';
export * from './mesh';
export * from './status';
