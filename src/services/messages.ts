// =============================================================================
// BASTION — User-Facing Messages
//
// Presentation only. Tests assert on which outcome was produced, not on
// this wording.
// =============================================================================

export const messages = {
  accessDenied: (what: string) =>
    `Permission denied: you do not have permission to ${what}.`,

  refused: () =>
    "I'm sorry, I can't help with that request. If you think this is a mistake, please contact support.",

  escalated: (ticketId: string) =>
    `Your request has been passed to a human agent for review. Ticket ID: ${ticketId}.`,

  escalationFailed: () =>
    'We could not escalate your request right now. Please contact support.',

  storageUnavailable: () =>
    'The service is temporarily unavailable. Please try again later or contact support.',

  fraudReported: (ticketId: string) =>
    `Fraud report submitted. Ticket ID: ${ticketId}. Our fraud prevention team will review it ` +
    'within 24 hours and your account has been flagged for monitoring.',
} as const;
