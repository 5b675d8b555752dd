/**
 * Noise filter for user-authored messages
 *
 * Logs interleave what the user typed with text the harness injects
 * (environment context, instruction files, shell/slash-command echoes).
 * Only the former counts as a user turn or a topic.
 */

const NOISE_PREFIXES: readonly string[] = [
  '# agents.md instructions',
  '<environment_context>',
  '<instructions>',
  '<user_instructions>',
  '<user_shell_command>',
  '<command-name>',
  '<command-message>',
  '<local-command-stdout>',
  '<local-command-stderr>',
  '<system-reminder>',
  'caveat: the messages below were generated',
  '[request interrupted by user',
];

export function isNoiseText(text: string): boolean {
  const stripped = text.trim();
  if (!stripped) return true;

  const lowered = stripped.toLowerCase();
  if (NOISE_PREFIXES.some(prefix => lowered.startsWith(prefix))) {
    return true;
  }

  // Instruction banners that are not at the very start
  return lowered.includes('agents.md') && lowered.includes('instructions');
}
