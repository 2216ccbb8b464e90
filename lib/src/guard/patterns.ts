/**
 * Prompt injection patterns. Each is tested independently and
 * case-insensitively; any match refuses the query.
 */
export const INJECTION_PATTERNS: readonly RegExp[] = [
  /ignore\s+(all\s+)?(previous|above|prior)\s+(instructions?|prompts?)/i,
  /disregard\s+(all\s+)?(previous|above|prior)/i,
  /you\s+are\s+now\s+(?:a|an)\s+/i,
  /system\s*:\s*/i,
  /<\|system\|>/i,
  /act\s+as\s+(?:a|an)\s+/i,
  /forget\s+(everything|all|your|previous)/i,
  /new\s+instructions?\s*:/i,
  /override\s+(your|system|all)\s+/i,
  /pretend\s+(you|that|to)\s+/i,
  /jailbreak/i,
  /DAN\s+mode/i,
];
