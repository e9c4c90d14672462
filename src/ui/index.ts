export { Formatters } from './formatters';
export { summarize } from './summary';
export type { SummaryRow } from './summary';
