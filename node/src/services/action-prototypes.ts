// Canonical exemplar phrases per action. Table order is the tie-break order for classification.
import type { ActionRequired } from '@/types/core';

export interface ActionPrototype {
  action: ActionRequired;
  phrases: readonly string[];
}

export type ActionPrototypes = readonly ActionPrototype[];

export const ACTION_PROTOTYPES: ActionPrototypes = [
  {
    action: 'escalate_to_abuse_team',
    phrases: [
      'Domain suspended for phishing, malware, or spam',
      'Abuse complaint requires review by the Abuse Team',
      'Support must not manually reactivate this domain',
      'This suspension is due to a policy violation or abuse report',
    ],
  },
  {
    action: 'escalate_to_billing',
    phrases: [
      'Billing dispute involving charges, refunds, or invoices',
      'Customer reports duplicate charge or payment failure',
      'Domain suspended due to unpaid invoice or payment issue',
      'Refund eligibility must be reviewed by Billing Team',
    ],
  },
  {
    action: 'escalate_to_technical',
    phrases: [
      'Domain is active but DNS is not resolving',
      'Service outage or technical failure after renewal',
      'System issue where services remain offline unexpectedly',
      'Technical investigation required for infrastructure failure',
    ],
  },
  {
    action: 'escalate_to_support',
    phrases: [
      'Domain suspended due to WHOIS verification issues',
      'Customer reports domain still suspended after completing WHOIS verification',
      'Support needs to review account status and system flags',
      'Manual review required for non-abuse domain suspension',
    ],
  },
  {
    action: 'customer_action_required',
    phrases: [
      'Customer must verify WHOIS email address',
      'Registrant information must be updated to restore domain',
      'User needs to unlock the domain before transfer',
      'Customer must complete remediation steps',
    ],
  },
  {
    action: 'follow_up_required',
    phrases: [
      'Reactivation will occur after review is completed',
      'Support will monitor and follow up after verification',
      'Additional review time is required before action',
    ],
  },
  {
    action: 'none',
    phrases: [
      'General informational question about domains',
      'Explanation of policy without required action',
      'Customer is asking how the system works',
      'No action is required from support or customer',
    ],
  },
];
