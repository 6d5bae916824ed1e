export * from './types.js';
export { TransferError } from './errors.js';
export type { TransferErrorKind } from './errors.js';
export { ProgressTracker } from './progress.js';
export type { ProgressTrackerOptions } from './progress.js';
export { ResumeNegotiator, FRESH_START } from './resume.js';
export { ControlChannel, LatestValueChannel } from './control.js';
export type { Listener } from './control.js';
export { TransferStateMachine, InvalidTransitionError, isTerminal } from './state.js';
export type { StateListener } from './state.js';
export { TransferLoop, crossBoundary } from './loop.js';
export type { TransferLoopOptions, LoopResult } from './loop.js';
export { DestinationRegistry, inferFileName, sharedDestinations } from './destination.js';
export { TransferSession } from './session.js';
export type { TransferDependencies, TransferSessionOptions } from './session.js';
