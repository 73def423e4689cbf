/**
 * Organisation membership reader
 *
 * Lists the members of the managed organisation and marks the one the sync
 * credential belongs to. A failed request surfaces as
 * VaultWardenAuthError (401/403) or VaultWardenUnavailableError (anything else).
 */

import type { VaultWardenClient } from '../../api/client.js';
import { ApiRequestError } from '../../api/retry.js';
import { OrganizationUserStatusCode, type OrganizationUser, type Profile } from '../../api/types.js';
import { normalizeEmail } from '../../utils/email.js';
import {
  SyncError,
  VaultWardenAuthError,
  VaultWardenUnavailableError,
  describeError,
} from '../../errors.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import type { MemberStatus, OrgMember } from './types.js';

/**
 * Members plus the identity they were matched against
 */
export interface MembershipSnapshot {
  members: OrgMember[];
  /** Profile of the sync credential */
  profile: Profile;
  /** The member marked isSelf, if any */
  self?: OrgMember;
}

export interface ReadMembershipOptions {
  /** Personal API key client id; its uuid part is the account id */
  clientId?: string;
  logger?: Logger;
}

const STATUS_NAMES: Record<OrganizationUserStatusCode, MemberStatus> = {
  [OrganizationUserStatusCode.Revoked]: 'Revoked',
  [OrganizationUserStatusCode.Invited]: 'Invited',
  [OrganizationUserStatusCode.Accepted]: 'Accepted',
  [OrganizationUserStatusCode.Confirmed]: 'Confirmed',
};

/**
 * Map a wire status code to its name
 */
export function memberStatus(code: OrganizationUserStatusCode): MemberStatus {
  return STATUS_NAMES[code];
}

/**
 * Account id encoded in a `user.<uuid>` client id
 */
export function accountIdFromClientId(clientId: string | undefined): string | undefined {
  if (!clientId?.startsWith('user.')) {
    return undefined;
  }
  const id = clientId.slice('user.'.length).trim();
  return id.length > 0 ? id.toLowerCase() : undefined;
}

/**
 * Convert raw organisation users and mark the sync credential's member
 *
 * Account id matches win; the profile email is only used when no member
 * carries a matching account id.
 */
export function toOrgMembers(
  users: readonly OrganizationUser[],
  profile: Profile,
  clientId?: string
): OrgMember[] {
  const selfIds = new Set<string>([profile.id.toLowerCase()]);
  const fromClientId = accountIdFromClientId(clientId);
  if (fromClientId) {
    selfIds.add(fromClientId);
  }

  const matchesId = (user: OrganizationUser): boolean =>
    user.userId !== undefined && selfIds.has(user.userId.toLowerCase());

  const anyIdMatch = users.some(matchesId);
  const selfEmail = normalizeEmail(profile.email);

  return users.map((user) => {
    const email = normalizeEmail(user.email);
    return {
      id: user.id,
      userId: user.userId,
      email,
      status: memberStatus(user.status),
      isSelf: anyIdMatch ? matchesId(user) : email === selfEmail,
    };
  });
}

function toReadError(err: unknown): SyncError {
  if (err instanceof SyncError) {
    return err;
  }
  if (err instanceof ApiRequestError && err.isAuthError()) {
    return new VaultWardenAuthError(`VaultWarden refused access: ${err.message}`, { cause: err });
  }
  return new VaultWardenUnavailableError(`Cannot read organisation members: ${describeError(err)}`, {
    cause: err,
  });
}

/**
 * Read the organisation members
 *
 * @throws VaultWardenAuthError or VaultWardenUnavailableError
 */
export async function readMembership(
  client: Pick<VaultWardenClient, 'members' | 'accounts'>,
  options: ReadMembershipOptions = {}
): Promise<MembershipSnapshot> {
  const log = options.logger ?? defaultLogger;

  let users: OrganizationUser[];
  let profile: Profile;
  try {
    profile = await client.accounts.profile();
    users = await client.members.list();
  } catch (err) {
    throw toReadError(err);
  }

  const members = toOrgMembers(users, profile, options.clientId);
  const self = members.find((member) => member.isSelf);

  if (self) {
    log.debug(`Sync credential is member ${self.email}`, { memberId: self.id });
  } else {
    log.debug('Sync credential is not a member of the organisation', { profileEmail: profile.email });
  }

  log.debug(`Fetched ${members.length} VaultWarden members`, {
    revoked: members.filter((m) => m.status === 'Revoked').length,
  });
  for (const member of members) {
    log.debug(`VW: ${member.email} - ${member.status}${member.isSelf ? ' (self)' : ''}`);
  }

  return { members, profile, self };
}
