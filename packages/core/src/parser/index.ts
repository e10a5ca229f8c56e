export { parseTransactions } from './transactions.js';
