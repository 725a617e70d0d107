// Centralized key naming so you don't scatter magic strings.
// Rate limiting and identity caching share one Redis but never one prefix.
export const RKeys = {
  // rate limit per route bucket + client
  rlBucket: (bucket: string, client: string) => `rl:${bucket}:${client}`,
  // access-token fingerprint -> resolved identity
  identity: (tokenFingerprint: string) => `idc:${tokenFingerprint}`,
};
