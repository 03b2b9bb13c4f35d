// Re-export all types from their respective modules for convenient importing
export * from './config';
export * from './directive';
export * from './docker';
export * from './flexConfig';
