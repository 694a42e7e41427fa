import { z } from 'zod';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type QueryValue = string | number | boolean;

export interface AdminRequest {
  method: HttpMethod;
  path: string;                          // already URL-encoded
  query?: Record<string, QueryValue | undefined>;
  body?: unknown;                        // serialized as JSON when present
  accessToken?: string;                  // overrides the admin token for this request
}

export interface AdminResponse {
  status: number;
  statusMessage: string;
  body: string;
  method: HttpMethod;
  path: string;
}

// Response shapes. Every schema passes unknown keys through so results stay verbatim.

export const AnyObjectSchema = z.object({}).passthrough();
export type AnyObject = z.infer<typeof AnyObjectSchema>;

export const MatrixErrorSchema = z.object({
  errcode: z.string().optional(),
  error: z.string().optional(),
}).passthrough();

export const AffectedResultSchema = z.object({
  affected: z.array(z.string()),
}).passthrough();
export type AffectedResult = z.infer<typeof AffectedResultSchema>;

export const NonceResultSchema = z.object({
  nonce: z.string(),
}).passthrough();

export const RegisterResultSchema = z.object({
  user_id: z.string(),
  access_token: z.string().optional(),
  home_server: z.string().optional(),
  device_id: z.string().optional(),
}).passthrough();
export type RegisterResult = z.infer<typeof RegisterResultSchema>;

export const PasswordResetResultSchema = z.object({
  password_updated: z.boolean(),
}).passthrough();
export type PasswordResetResult = z.infer<typeof PasswordResetResultSchema>;

export const WhoisResultSchema = z.object({
  user_id: z.string(),
}).passthrough();
export type WhoisResult = z.infer<typeof WhoisResultSchema>;

export const ServerNoticeResultSchema = z.object({
  event_id: z.string(),
}).passthrough();
export type ServerNoticeResult = z.infer<typeof ServerNoticeResultSchema>;

export const LoginResultSchema = z.object({
  access_token: z.string(),
  user_id: z.string().optional(),
  device_id: z.string().optional(),
}).passthrough();

export const InteractiveAuthSchema = z.object({
  session: z.string(),
  flows: z.array(z.unknown()),
}).passthrough();

export const AccountSchema = z.object({
  name: z.string(),
  displayname: z.string().nullable().optional(),
  avatar_url: z.string().nullable().optional(),
  admin: z.union([z.boolean(), z.number()]).optional(),
  deactivated: z.union([z.boolean(), z.number()]).optional(),
  is_guest: z.union([z.boolean(), z.number()]).optional(),
  user_type: z.string().nullable().optional(),
  creation_ts: z.number().nullable().optional(),
}).passthrough();
export type Account = z.infer<typeof AccountSchema>;

export const AccountPageSchema = z.object({
  users: z.array(AccountSchema),
  next_token: z.union([z.string(), z.number()]).nullable().optional(),
  total: z.number().optional(),
}).passthrough();

export const PublicRoomSchema = z.object({
  room_id: z.string(),
  canonical_alias: z.string().nullable().optional(),
  name: z.string().nullable().optional(),
  topic: z.string().nullable().optional(),
  num_joined_members: z.number().optional(),
  world_readable: z.boolean().optional(),
  guest_can_join: z.boolean().optional(),
}).passthrough();
export type PublicRoom = z.infer<typeof PublicRoomSchema>;

export const PublicRoomsPageSchema = z.object({
  chunk: z.array(PublicRoomSchema),
  next_batch: z.string().nullable().optional(),
  total_room_count_estimate: z.number().optional(),
}).passthrough();

export interface RegisterOptions {
  sharedSecret: string;
  username: string;
  password: string;
  displayName?: string;
  admin?: boolean;
}

export interface ResetPasswordOptions {
  password: string;
  logoutDevices?: boolean;
}

export interface ListOptions {
  pageSize?: number;
}

/**
 * The public operation surface of the manager
 */
export interface AdminApi {
  registerNonce(): Promise<string>;
  register(options: RegisterOptions): Promise<RegisterResult>;
  evacuateRoom(roomId: string): Promise<AffectedResult>;
  evacuateUser(userId: string): Promise<AffectedResult>;
  purgeRoom(roomId: string): Promise<AnyObject>;
  refreshDevices(userId: string): Promise<AnyObject>;
  reindexEvents(): Promise<AnyObject>;
  whois(userId: string): Promise<WhoisResult>;
  resetPassword(userId: string, options: ResetPasswordOptions): Promise<PasswordResetResult>;
  sendServerNotice(userId: string, content: Record<string, unknown>): Promise<ServerNoticeResult>;
  listAccounts(options?: ListOptions): Promise<Account[]>;
  listRooms(options?: ListOptions): Promise<PublicRoom[]>;
  deactivateAccount(userId: string): Promise<AnyObject>;
  close(): void;
}
