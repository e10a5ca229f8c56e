export { serializeAccounts } from './accounts.js';
