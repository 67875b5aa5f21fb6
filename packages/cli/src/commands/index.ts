/**
 * sr-topology CLI commands
 */

export { createStartCommand } from './start';
export { createDescribeCommand } from './describe';
export { createComposeCommand } from './compose';
export { createValidateCommand } from './validate';
