/**
 * ANSI Formatting Utilities
 *
 * Escape codes for the log prefixes and the human-readable `watch` output.
 */

// Reset
export const RESET = "\x1b[0m";

// ============================================================================
// Text Styles
// ============================================================================

export const BOLD = "\x1b[1m";
export const DIM = "\x1b[2m";

// ============================================================================
// Foreground Colors
// ============================================================================

export const RED = "\x1b[31m";
export const GREEN = "\x1b[32m";
export const YELLOW = "\x1b[33m";
export const CYAN = "\x1b[36m";
export const GRAY = "\x1b[90m";

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Check if color output is disabled
 */
export function isColorDisabled(): boolean {
  return process.env.NO_COLOR !== undefined || !process.stderr.isTTY;
}

/**
 * Apply style to text
 */
export function styled(text: string, ...styles: string[]): string {
  if (isColorDisabled()) {
    return text;
  }
  return styles.join("") + text + RESET;
}

export function bold(text: string): string {
  return styled(text, BOLD);
}

export function dim(text: string): string {
  return styled(text, DIM);
}

export function red(text: string): string {
  return styled(text, RED);
}

export function green(text: string): string {
  return styled(text, GREEN);
}

export function yellow(text: string): string {
  return styled(text, YELLOW);
}

export function cyan(text: string): string {
  return styled(text, CYAN);
}

export function gray(text: string): string {
  return styled(text, GRAY);
}
