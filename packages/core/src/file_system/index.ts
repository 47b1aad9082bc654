export * from './file_system';
