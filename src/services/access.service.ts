import { ProtocolConfig, Role } from '../models/protocol.types';
import { UnauthorizedError } from '../utils/errors';

// Identities are compared for equality only; authentication happens upstream
export function hasRole(protocol: Pick<ProtocolConfig, 'owner_id' | 'oracle_id'>, caller: string, role: Role): boolean {
  switch (role) {
    case 'owner':
      return caller === protocol.owner_id;
    case 'oracle':
      return caller === protocol.oracle_id;
  }
}

export function assertRole(protocol: Pick<ProtocolConfig, 'owner_id' | 'oracle_id'>, caller: string, role: Role): void {
  if (!hasRole(protocol, caller, role)) {
    throw new UnauthorizedError(role);
  }
}

/**
 * Records a privileged mutation. Written to the console so it lands in the
 * same log stream as request logs.
 */
export function logAdminAction(
  actor: string,
  role: Role,
  action: string,
  details?: Record<string, unknown>
): void {
  console.log('[AUDIT]', {
    actor,
    role,
    action,
    details,
    at: new Date().toISOString(),
  });
}
