export { summarize, summarizeDraft } from './summary-aggregator.js';
