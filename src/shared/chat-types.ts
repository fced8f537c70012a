/**
 * Zod schemas for the chat server's REST and streaming payloads.
 *
 * The server speaks snake_case; every schema transforms its payload into a
 * camelCase, read-only domain type.
 */

import { z } from 'zod';

function isParseableDate(value: string): boolean {
  return !Number.isNaN(Date.parse(value));
}

/** A list the server may send as `null` when it is empty. */
function nullableList<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(item)
    .nullable()
    .transform((items): z.output<T>[] => items ?? []);
}

// ============================================================================
// User
// ============================================================================

const UserFieldsSchema = z.object({
  id: z.number().int(),
  username: z.string(),
  role: z.string().optional(),
  avatar_url: z.string().nullable().optional(),
});

export const UserSchema = UserFieldsSchema.transform((user) => ({
  id: user.id,
  username: user.username,
  role: user.role ?? '',
  avatarUrl: user.avatar_url || null,
}));

export type User = Readonly<z.output<typeof UserSchema>>;

export const UserListSchema = nullableList(UserSchema);

export const LoginResponseSchema = UserFieldsSchema.extend({
  token: z.string(),
}).transform(({ token, ...user }) => ({
  token,
  user: UserSchema.parse(user),
}));

export type LoginResponse = z.output<typeof LoginResponseSchema>;

// ============================================================================
// Channels and categories
// ============================================================================

export const ChannelSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    category_id: z.number().int(),
    position: z.number().int(),
  })
  .transform((channel) => ({
    id: channel.id,
    name: channel.name,
    categoryId: channel.category_id,
    position: channel.position,
  }));

export type Channel = Readonly<z.output<typeof ChannelSchema>>;

export const ChannelCategorySchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    position: z.number().int(),
    channels: nullableList(ChannelSchema).optional(),
  })
  .transform((category) => ({
    id: category.id,
    name: category.name,
    position: category.position,
    channels: category.channels ?? [],
  }));

export type ChannelCategory = Readonly<z.output<typeof ChannelCategorySchema>>;

export const ChannelCategoryListSchema = nullableList(ChannelCategorySchema);

// ============================================================================
// Messages
// ============================================================================

export const MessageSchema = z
  .object({
    id: z.number().int(),
    channel_id: z.number().int(),
    user_id: z.number().int(),
    username: z.string(),
    content: z.string(),
    created_at: z.string().refine(isParseableDate, { message: 'Invalid timestamp' }),
    avatar_url: z.string().nullable().optional(),
  })
  .transform((message) => ({
    id: message.id,
    channelId: message.channel_id,
    userId: message.user_id,
    username: message.username,
    content: message.content,
    createdAt: message.created_at,
    avatarUrl: message.avatar_url || null,
  }));

export type Message = Readonly<z.output<typeof MessageSchema>>;

export const MessageListSchema = nullableList(MessageSchema);

/**
 * Body of POST /api/messages. The author is inferred server-side from the token.
 */
export interface SendMessageRequest {
  channel_id: number;
  content: string;
}
