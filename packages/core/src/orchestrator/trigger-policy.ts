/**
 * Trigger policy: decides once per run whether deploy stages may run
 */

import type { ServiceDefinition, TriggerContext, TriggerPolicy } from '@tidewater/shared';

const BRANCH_REF_PREFIX = 'refs/heads/';

export function normalizeBranch(branch: string): string {
  return branch.startsWith(BRANCH_REF_PREFIX) ? branch.slice(BRANCH_REF_PREFIX.length) : branch;
}

export function shouldDeploy(trigger: TriggerContext, policy: TriggerPolicy): boolean {
  return (
    normalizeBranch(trigger.branch) === normalizeBranch(policy.releaseBranch) &&
    policy.deployOn.includes(trigger.event)
  );
}

export interface GatedServices {
  services: ServiceDefinition[];
  deployEnabled: boolean;
}

/**
 * Remove deploy stages from every service unless the trigger may deploy.
 * Returns new service definitions; the input is not modified.
 */
export function applyTriggerPolicy(
  services: ServiceDefinition[],
  trigger: TriggerContext,
  policy: TriggerPolicy
): GatedServices {
  const deployEnabled = shouldDeploy(trigger, policy);
  if (deployEnabled) {
    return { services, deployEnabled };
  }

  return {
    deployEnabled,
    services: services.map((service) => ({
      ...service,
      stages: service.stages.filter((stage) => stage.kind !== 'deploy'),
    })),
  };
}
