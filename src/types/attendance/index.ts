// types/attendance/index.ts
export * from './records';
export * from './state';
export * from './notification';
export * from './error';
