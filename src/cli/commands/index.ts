/**
 * CLI Commands - Public API
 */

export { executeListCommand, type ListCommandDeps, type ListCommandOptions } from './list.js';
export {
  executeProvisionCommand,
  type ProvisionCommandDeps,
  type ProvisionCommandOptions,
  type ProvisionRequest,
} from './provision.js';
export { executeCommissionCommand, type CommissionCommandDeps } from './commission.js';
export { executeRunCommand, type RunCommandDeps } from './run.js';
export { pierFailure } from './pier-failure.js';
