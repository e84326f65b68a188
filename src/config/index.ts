export { ConfigLoader, CONFIG_FILENAME } from './ConfigLoader';
export * from './schemas/config.schema';
