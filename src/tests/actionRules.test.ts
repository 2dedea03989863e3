/**
 * Tests Action Rules and Prompts - Support Knowledge Assistant
 */

import { describe, it, expect } from 'vitest';
import { classifyAction } from '@/ai/generation/actionRules';
import { SUPPORT_SYSTEM_PROMPT, buildTicketPrompt } from '@/ai/generation/prompts';
import { SUPPORT_ACTIONS } from '@/ai/generation/types';
import type { SupportAction } from '@/ai/generation/types';

describe('classifyAction', () => {
  const cases: Array<[SupportAction, string[]]> = [
    ['escalate_to_abuse_team', ['My domain was suspended', 'Policy violation occurred', 'Abuse complaint filed']],
    [
      'escalate_to_billing_team',
      ['I have a billing question', 'Payment was charged incorrectly', 'I need a refund for my invoice'],
    ],
    [
      'escalate_to_technical_team',
      ['DNS is not working', 'Nameserver configuration error', 'Technical issue with my domain'],
    ],
    ['escalate_to_legal_team', ['Legal action against domain', 'DMCA takedown request', 'Court order received']],
    [
      'escalate_to_management',
      ['I want to speak to a manager', 'Customer complaint about service', 'I am unsatisfied with support'],
    ],
    ['contact_customer_directly', ['This is urgent', 'Emergency situation', 'Need help ASAP']],
  ];

  for (const [action, tickets] of cases) {
    it(`maps tickets to ${action}`, () => {
      for (const ticket of tickets) {
        expect(classifyAction(ticket)).toBe(action);
      }
    });
  }

  it('returns no_action_required when no rule matches', () => {
    expect(classifyAction('I have a general question about my domain')).toBe('no_action_required');
  });

  it('applies the first matching rule', () => {
    expect(classifyAction('Urgent: my domain was suspended')).toBe('escalate_to_abuse_team');
  });
});

describe('prompts', () => {
  it('lists every allowed action in the system prompt', () => {
    for (const action of SUPPORT_ACTIONS) {
      expect(SUPPORT_SYSTEM_PROMPT).toContain(action);
    }
    expect(SUPPORT_SYSTEM_PROMPT).toContain('"action_required"');
  });

  it('embeds ticket, context and references verbatim', () => {
    const prompt = buildTicketPrompt('My domain is down', 'Source 1: dns.md: DNS\nCheck nameservers\n', [
      'dns.md: DNS',
    ]);

    expect(prompt).toContain('CONTEXT (Company Documentation):\nSource 1: dns.md: DNS\nCheck nameservers\n');
    expect(prompt).toContain('AVAILABLE REFERENCES:\n- dns.md: DNS\n');
    expect(prompt).toContain('CUSTOMER TICKET:\nMy domain is down\n');
    expect(prompt).toContain('OUTPUT SCHEMA:');
  });

  it('marks an empty reference list', () => {
    expect(buildTicketPrompt('ticket', 'No relevant documentation found.', [])).toContain(
      'AVAILABLE REFERENCES:\n- (none)\n'
    );
  });

  it('is deterministic', () => {
    expect(buildTicketPrompt('a', 'b', ['c'])).toBe(buildTicketPrompt('a', 'b', ['c']));
  });
});
