/**
 * Default Policy
 *
 * Returns the rule set written by `sysgate init`: each action is allowed,
 * and the built-in denies still apply on top.
 */

import type { PolicyConfig } from '../core/types.js';

export function getDefaultPolicy(): PolicyConfig {
  return {
    version: '1',
    rules: [
      {
        id: 'allow-start-application',
        match: { action: 'start_application' },
        decision: 'allow',
        reason: 'Starting desktop applications is permitted',
      },
      {
        id: 'allow-kill-process',
        match: { action: 'kill_process' },
        decision: 'allow',
        reason: 'Stopping user processes is permitted',
      },
      {
        id: 'allow-list-processes',
        match: { action: 'list_processes' },
        decision: 'allow',
        reason: 'Listing processes is read-only',
      },
      {
        id: 'allow-restart-service',
        match: { action: 'restart_service' },
        decision: 'allow',
        reason: 'Restarting non-critical services is permitted',
      },
      {
        id: 'allow-shell-query',
        match: { action: 'shell_query' },
        decision: 'allow',
        reason: 'ps and grep queries are read-only',
      },
    ],
  };
}
