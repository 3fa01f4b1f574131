/**
 * Sync Engine Agents
 */

export {
  ReconciliationAgent,
  createReconciliationAgent,
  type ReconciliationAgentDependencies,
} from './reconciliation.js';

export {
  OrderDecrementAgent,
  createOrderDecrementAgent,
  type OrderAgentDependencies,
} from './order.js';
