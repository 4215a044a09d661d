export {
  CheckExecutor,
  assertProbeableUrl,
  createProbeClient,
  describeFailure,
  isTransientError,
  parseJsonKeys,
} from './CheckExecutor';
export type { CheckExecutorSettings, HttpRequester } from './types';
