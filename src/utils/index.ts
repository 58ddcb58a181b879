/**
 * @fileoverview Utility module exports.
 *
 * @module utils
 */

export { LimitedStack } from './limited-stack.js';
