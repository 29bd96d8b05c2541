export { handleDeposit, handleWithdrawal } from "./funds.js";
export { handleDispute, handleResolve, handleChargeback } from "./dispute.js";
export { findDisputeTarget } from "./dispute-target.js";
export type { DisputeTarget } from "./dispute-target.js";
