export * from './PorkbunProvider.js';
export * from './PorkbunTransport.js';
