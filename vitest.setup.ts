/**
 * Vitest setup for rootfinder
 *
 * Debug output from the scorer (unreadable directories, selection traces)
 * is silenced unless ROOTFINDER_LOG_LEVEL is set explicitly. Runs before each
 * test file imports the logger.
 */

if (!process.env.ROOTFINDER_LOG_LEVEL) {
  process.env.ROOTFINDER_LOG_LEVEL = 'silent';
}
