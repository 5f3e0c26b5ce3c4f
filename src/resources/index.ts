/**
 * MCP Resources for Interview Scheduling
 * Read-only views of the policy and limits the server applies
 */

import type { SchedulingService } from '../services/scheduling-service.js';
import { orderingCount } from '../services/agenda-search.js';

/**
 * Resource types available
 */
export interface ResourceDefinition {
  uri: string;
  name: string;
  description: string;
  mimeType: string;
}

/**
 * Resource list
 */
export const resourceDefinitions: ResourceDefinition[] = [
  {
    uri: 'scheduling://policy',
    name: 'Scheduling Policy',
    description: 'Default policy used when a tool call does not override it',
    mimeType: 'application/json',
  },
  {
    uri: 'scheduling://limits',
    name: 'Search Limits',
    description: 'Panel-size limits and the search time budget',
    mimeType: 'application/json',
  },
];

/**
 * Resource handler type
 */
export type ResourceHandler = () => Promise<{ contents: Array<{ uri: string; mimeType: string; text: string }> }>;

/**
 * Create resource handlers
 */
export function createResourceHandlers(
  schedulingService: SchedulingService
): Record<string, ResourceHandler> {
  return {
    'scheduling://policy': async () => {
      const policy = schedulingService.resolvePolicy();

      return {
        contents: [{
          uri: 'scheduling://policy',
          mimeType: 'application/json',
          text: JSON.stringify(policy, null, 2),
        }],
      };
    },

    'scheduling://limits': async () => {
      const limits = schedulingService.getLimits();
      const response = {
        ...limits,
        orderingsAtMax: orderingCount(limits.maxInterviewers),
      };

      return {
        contents: [{
          uri: 'scheduling://limits',
          mimeType: 'application/json',
          text: JSON.stringify(response, null, 2),
        }],
      };
    },
  };
}
