/**
 * Support Knowledge Assistant - Generation Types
 * ==============================================
 */

import { z } from 'zod';

export const SUPPORT_ACTIONS = [
  'escalate_to_technical_team',
  'escalate_to_abuse_team',
  'escalate_to_billing_team',
  'escalate_to_management',
  'escalate_to_legal_team',
  'contact_customer_directly',
  'no_action_required',
] as const;

export type SupportAction = (typeof SUPPORT_ACTIONS)[number];

/**
 * What the caller gets back: always complete, either from the model or a fallback
 */
export interface StructuredAnswer {
  answer: string;
  references: string[];
  action: SupportAction;
}

/**
 * Shape the generation service must return
 */
export const generationOutputSchema = z.object({
  answer: z.string().trim().min(1),
  references: z.array(z.string()),
  action_required: z.enum(SUPPORT_ACTIONS),
});
