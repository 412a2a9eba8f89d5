export {
  MutationInterceptor,
  selectResolvedCalls,
  attachResolution,
  loanIdFromArguments,
  type InterceptorState,
  type ExtractionOutcome,
  type DispatchOutcome,
  type InterceptOutcome,
  type MutationInterceptorOptions,
  type ExecutionResultLike,
  type ExecutionErrorLike,
  type ResolutionOptions,
} from './mutation-interceptor.js';
export { DispatchTracker } from './dispatch-tracker.js';
