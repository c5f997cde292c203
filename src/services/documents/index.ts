export { createDocument, textStatistics } from './document';
export type { DocumentInput } from './document';
