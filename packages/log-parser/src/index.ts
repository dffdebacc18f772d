export { AccessLogParser } from './access-log-parser';
export type { AccessLogParserOptions } from './access-log-parser';
