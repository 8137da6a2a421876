/**
 * Confirmation prompts in front of destructive steps.
 *
 * Questions default to "yes": an empty answer, `y` or `yes` (any case)
 * proceeds, anything else aborts. `--yes` answers every question without
 * asking.
 *
 * @module
 */

import * as clack from "@clack/prompts";

// =============================================================================
// Types
// =============================================================================

export interface ConfirmationPrompt {
  readonly question: string;

  /** Printed when the operator declines */
  readonly fallbackGuidance?: string;
}

export type ConfirmationDecision = "proceed" | "abort";

/**
 * Asks one question and returns the raw answer, or null if the prompt was
 * cancelled.
 */
export type AskFn = (question: string) => Promise<string | null>;

/**
 * Anything that can answer a confirmation prompt.
 */
export interface Confirmer {
  confirm(prompt: ConfirmationPrompt): Promise<ConfirmationDecision>;
}

export interface ConfirmationGateOptions {
  /** Answer every prompt with "yes" without asking */
  readonly skipPrompts: boolean;

  /** Where declined-prompt guidance goes */
  readonly output: (message: string) => void;

  /** Prompt implementation (default: @clack/prompts text input) */
  readonly ask?: AskFn;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Whether a raw answer counts as "yes". Empty input takes the default.
 */
export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === "" || normalized === "y" || normalized === "yes";
}

/**
 * Asks through @clack/prompts.
 */
export async function askWithClack(question: string): Promise<string | null> {
  const result = await clack.text({
    message: `${question} [Y/n]`,
    placeholder: "Y",
    defaultValue: "",
  });

  if (clack.isCancel(result)) {
    return null;
  }
  return result;
}

// =============================================================================
// ConfirmationGate Class
// =============================================================================

/**
 * @example
 * ```typescript
 * const gate = new ConfirmationGate({ skipPrompts: config.skipPrompts, output: ux.info });
 * const decision = await gate.confirm({
 *   question: "Discard local content?",
 *   fallbackGuidance: "Re-run without --import-db.",
 * });
 * ```
 */
export class ConfirmationGate implements Confirmer {
  private readonly skipPrompts: boolean;
  private readonly output: (message: string) => void;
  private readonly ask: AskFn;

  constructor(options: ConfirmationGateOptions) {
    this.skipPrompts = options.skipPrompts;
    this.output = options.output;
    this.ask = options.ask ?? askWithClack;
  }

  async confirm(prompt: ConfirmationPrompt): Promise<ConfirmationDecision> {
    if (this.skipPrompts) {
      return "proceed";
    }

    const answer = await this.ask(prompt.question);
    if (answer !== null && isAffirmative(answer)) {
      return "proceed";
    }

    if (prompt.fallbackGuidance) {
      this.output(prompt.fallbackGuidance);
    }
    return "abort";
  }
}
