export type { Outcome, Done, Fail, OutcomeMeta } from "./outcome";
export { isDone, isFail } from "./outcome";
export type { Failure, FailureReason } from "./failure";
export { failure, errorMessage } from "./failure";
export { done, fail, taskFailed, cancelled, budgetExceeded } from "./constructors";
export { match, unwrap } from "./matchers";
