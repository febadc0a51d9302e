import { DomainError } from '../errors/domain.error';
import type { InstanceContext } from '../types';

// arn:<partition>:connect:<region>:<account-id>:instance/<instance-id>
export function parseConnectInstanceArn(instanceArn: string, logGroup?: string): InstanceContext {
  const parts = instanceArn.split(':');

  if (parts.length < 6 || parts[0] !== 'arn' || parts[2] !== 'connect') {
    throw new DomainError({
      code: 'CONFIGURATION_ERROR',
      message: `Invalid Connect instance ARN format: ${instanceArn}`,
    });
  }

  const [, partition, , awsRegion, accountId, ...rest] = parts;
  const resource = rest.join(':');

  if (!resource.startsWith('instance/') || resource.length === 'instance/'.length) {
    throw new DomainError({
      code: 'CONFIGURATION_ERROR',
      message: `Invalid resource type in ARN: ${resource}`,
    });
  }

  return {
    instanceArn,
    instanceId: resource.slice('instance/'.length),
    awsRegion,
    accountId,
    partition,
    logGroup,
  };
}
