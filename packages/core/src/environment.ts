/**
 * Environment classification
 */

import { Environment, type RemoteBranch } from './types.js';

/**
 * Sort weights for fallback candidates (lower sorts first)
 */
export const ENVIRONMENT_WEIGHTS: Readonly<Record<Environment, number>> = {
  [Environment.Development]: 0,
  [Environment.Feature]: 1,
  [Environment.Production]: 2,
};

const UNKNOWN_ENVIRONMENT_WEIGHT = 3;

/**
 * Classify a remote branch
 *
 * The default flag is checked before the persistent flag, so a default
 * branch that is also marked persistent is still Production.
 */
export function classifyBranch(branch: RemoteBranch): Environment {
  if (branch.isDefault) {
    return Environment.Production;
  }
  if (branch.isPersistent) {
    return Environment.Development;
  }
  return Environment.Feature;
}

/**
 * Sort weight of an environment name
 *
 * Accepts any string so values read back from YAML or JSON still sort.
 */
export function environmentWeight(environment: string): number {
  switch (environment) {
    case Environment.Development:
      return ENVIRONMENT_WEIGHTS.Development;
    case Environment.Feature:
      return ENVIRONMENT_WEIGHTS.Feature;
    case Environment.Production:
      return ENVIRONMENT_WEIGHTS.Production;
    default:
      return UNKNOWN_ENVIRONMENT_WEIGHT;
  }
}

export function isProductionEnvironment(environment: Environment): boolean {
  return environment === Environment.Production;
}
