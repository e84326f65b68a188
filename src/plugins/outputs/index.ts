export { BaseOutputPlugin } from './BaseOutputPlugin';
export { JsonOutputPlugin, JSON_INDENT } from './JsonOutputPlugin';
export { CsvOutputPlugin } from './CsvOutputPlugin';
