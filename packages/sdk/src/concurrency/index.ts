export { ReentrancyGuard } from "./reentrancy-guard.js";
export { SerialExecutor } from "./serial-executor.js";
