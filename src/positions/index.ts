/**
 * Positions Module
 *
 * Exports:
 * - SellRuleEngine: stop-loss / take-profit / hold-period exit rules
 */

export { SellRuleEngine } from './sell-rule-engine';
export type { SellThresholds } from './sell-rule-engine';
