/**
 * Support Knowledge Assistant - Action Rules
 * ==========================================
 * Deterministic keyword classifier for the support action.
 * First matching rule wins; rules are checked in table order.
 */

import type { SupportAction } from './types';

export interface ActionRule {
  action: SupportAction;
  keywords: readonly string[];
}

export const ACTION_RULES: readonly ActionRule[] = [
  {
    action: 'escalate_to_abuse_team',
    keywords: ['suspend', 'violation', 'abuse', 'spam', 'phishing', 'malware'],
  },
  {
    action: 'escalate_to_billing_team',
    keywords: ['billing', 'payment', 'charged', 'refund', 'invoice'],
  },
  {
    action: 'escalate_to_legal_team',
    keywords: ['legal', 'dmca', 'court', 'lawsuit', 'trademark'],
  },
  {
    action: 'escalate_to_technical_team',
    keywords: ['dns', 'nameserver', 'technical', 'ssl certificate', 'not working'],
  },
  {
    action: 'escalate_to_management',
    keywords: ['manager', 'complaint', 'unsatisfied', 'dissatisfied'],
  },
  {
    action: 'contact_customer_directly',
    keywords: ['urgent', 'emergency', 'asap'],
  },
];

export function classifyAction(text: string, rules: readonly ActionRule[] = ACTION_RULES): SupportAction {
  const normalized = text.toLowerCase();

  for (const rule of rules) {
    if (rule.keywords.some((keyword) => normalized.includes(keyword))) {
      return rule.action;
    }
  }

  return 'no_action_required';
}
