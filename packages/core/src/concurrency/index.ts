export { delay, waitFor, type WaitForOptions } from "./delay";
export { Mutex } from "./mutex";
export {
  ObservableValue,
  type Listener,
  type ReadonlyObservable,
  type Unsubscribe,
} from "./observable";
export { createPolledObservable } from "./poller";
export { SerialExecutor } from "./serialExecutor";
