/**
 * Webhook payload schemas
 * Only the fields the modes read are declared; everything else is stripped.
 */

import { z } from 'zod';

export const LabelSchema = z.object({
  name: z.string()
});

export const UserLoginSchema = z.object({
  login: z.string()
});

export const IssuePayloadSchema = z.object({
  action: z.string(),
  issue: z.object({
    number: z.number(),
    title: z.string(),
    body: z.string().nullish(),
    html_url: z.string(),
    state: z.string(),
    labels: z.array(LabelSchema).default([]),
    user: UserLoginSchema.nullish()
  }),
  label: LabelSchema.optional()
});

export const PushCommitSchema = z.object({
  id: z.string(),
  message: z.string(),
  url: z.string(),
  author: z.object({
    name: z.string(),
    username: z.string().optional()
  })
});

export const PushPayloadSchema = z.object({
  ref: z.string(),
  commits: z.array(PushCommitSchema).default([]),
  repository: z.object({
    name: z.string(),
    full_name: z.string()
  })
});

export type IssuePayload = z.infer<typeof IssuePayloadSchema>;
export type PushPayload = z.infer<typeof PushPayloadSchema>;
export type PushCommit = z.infer<typeof PushCommitSchema>;

