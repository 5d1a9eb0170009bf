export * from './test-database.js';
export * from './fake-device.js';
