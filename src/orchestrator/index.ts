/**
 * Orchestrator Module
 *
 * Exports:
 * - CadenceGate: one cycle at a time, trading days only, minimum spacing
 * - DecisionCycle: gate -> merge -> decide -> approve -> execute under a hard timeout
 * - Approval gates: automatic for the server, interactive for the CLI
 * - SellCheckRunner: exit rules over live positions
 */

export { CadenceGate, FileRunMarkerStore, MemoryRunMarkerStore } from './cadence-gate';
export type { GateLease, GateState, RunMarker, RunMarkerStore } from './cadence-gate';

export { DecisionCycle } from './decision-cycle';
export type { DecisionCycleDeps, RunOptions } from './decision-cycle';

export {
  autoApprove,
  parseApprovalInput,
  promptApprovalGate,
  selectApprovedPicks,
  timeoutDecision,
} from './approval';
export type {
  ApprovalAction,
  ApprovalDecision,
  ApprovalGate,
  ApprovalRequest,
  ApprovalTimeoutAction,
  PromptApprovalOptions,
} from './approval';

export { rankByScoreDecisionStage } from './decision-stage';
export type { DecisionInput, DecisionStage } from './decision-stage';

export { SellCheckRunner } from './sell-check-runner';
export type { SellCheckOptions } from './sell-check-runner';
