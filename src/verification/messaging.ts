export type InlineButton =
  | { label: string; action: string }
  | { label: string; url: string };

export interface MessageContent {
  text: string;
  buttons?: InlineButton[][];
}

export type Outbound = string | MessageContent;

export interface InviteHandle {
  groupId: number;
  link: string;
  expiresAt: number;
}

/**
 * Transport used by the verification services. The grammy implementation
 * lives in bot/gateway.ts.
 */
export interface MessagingGateway {
  sendDirectMessage(userId: number, content: Outbound): Promise<void>;
  sendGroupMessage(groupId: number, content: Outbound): Promise<void>;
  /** Single-use invite that expires at `expiresAt` (epoch ms). */
  createOneTimeInvite(groupId: number, options: { name: string; expiresAt: number }): Promise<InviteHandle>;
  revokeInvite(invite: InviteHandle): Promise<void>;
  /** Remove without a permanent ban, so the user can rejoin after verifying. */
  removeMember(groupId: number, userId: number): Promise<void>;
  isMember(groupId: number, userId: number): Promise<boolean>;
  /** Deep link that opens a private chat with the bot carrying `payload`. */
  startLink(payload: string): string;
}
