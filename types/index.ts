export * from './config';
export * from './session';
export * from './tweet-definitions';
export * from './upstream';
