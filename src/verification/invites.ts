import { errorMessage } from '../errors.js';
import { KeyedMutex, userKey } from './locks.js';
import type { InviteHandle, MessagingGateway } from './messaging.js';

export interface InviteOptions {
  ttlMs: number;
  now?: () => number;
}

interface OutstandingInvite extends InviteHandle {
  userId: number;
}

/**
 * Tracks the one-time invite issued to each verified user until it is
 * used, replaced or expires.
 */
export class InviteLinkManager {
  private readonly outstanding = new Map<string, OutstandingInvite>();
  private readonly locks = new KeyedMutex();
  private readonly now: () => number;

  constructor(
    private readonly gateway: MessagingGateway,
    private readonly options: InviteOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  async issue(groupId: number, userId: number): Promise<InviteHandle> {
    const key = userKey(groupId, userId);
    return this.locks.runExclusive(key, async () => {
      const previous = this.outstanding.get(key);
      if (previous) {
        this.outstanding.delete(key);
        await this.revoke(previous, 'replaced');
      }

      const invite = await this.gateway.createOneTimeInvite(groupId, {
        name: `Verified member ${userId}`,
        expiresAt: this.now() + this.options.ttlMs,
      });
      this.outstanding.set(key, { ...invite, userId });
      console.log(`[invites] Issued invite for user ${userId} in group ${groupId}`);
      return invite;
    });
  }

  /** A join consumes the invite; returns whether one was outstanding. */
  async onMemberJoined(groupId: number, userId: number): Promise<boolean> {
    const key = userKey(groupId, userId);
    return this.locks.runExclusive(key, async () => {
      const invite = this.outstanding.get(key);
      if (!invite) return false;

      this.outstanding.delete(key);
      await this.revoke(invite, 'used');
      return true;
    });
  }

  async expireStale(): Promise<number> {
    const now = this.now();
    let expired = 0;

    for (const [key, invite] of [...this.outstanding]) {
      if (invite.expiresAt > now) continue;

      await this.locks.runExclusive(key, async () => {
        const current = this.outstanding.get(key);
        if (current !== invite) return;
        this.outstanding.delete(key);
        await this.revoke(invite, 'expired');
        expired++;
      });
    }

    if (expired > 0) {
      console.log(`[invites] Expired ${expired} invite(s)`);
    }
    return expired;
  }

  outstandingFor(groupId: number, userId: number): InviteHandle | undefined {
    return this.outstanding.get(userKey(groupId, userId));
  }

  private async revoke(invite: OutstandingInvite, reason: string): Promise<void> {
    try {
      await this.gateway.revokeInvite(invite);
    } catch (error) {
      // Telegram refuses to revoke links that were already used up or expired
      console.error(`[invites] Could not revoke ${reason} invite for user ${invite.userId}: ${errorMessage(error)}`);
    }
  }
}
