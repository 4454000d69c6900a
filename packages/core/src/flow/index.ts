export { DemandStream, type DemandStreamOptions } from './demand-stream.js';
export { offer, type OfferResult } from './overflow.js';
export { ResultGate, type GateSink, type ResultGateOptions } from './result-gate.js';
export {
  SubscriptionMachine,
  type MachineEvent,
  type MachineOutput,
  type MachineState,
  type SubscriptionMachineOptions,
} from './subscription-machine.js';
