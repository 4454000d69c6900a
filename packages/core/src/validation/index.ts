export {
  DEFAULT_FLOW_CONTROL,
  MAX_DEMAND,
  OVERFLOW_STRATEGIES,
  addDemand,
  assertDemand,
  resolveFlowControlConfig,
  validateFlowControlConfig,
  type FlowControlConfig,
  type InputValidationResult,
  type OverflowStrategy,
  type ResolvedFlowControlConfig,
} from './flow-control.js';
