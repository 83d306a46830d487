export interface SelectionRequest {
  /** Ordered candidates offered to the user */
  candidates: string[];
  /** What the selection is for (e.g. "add", "remove", "move") */
  prompt: string;
  /** Optional text to fuzzy-match candidates against */
  query?: string;
}

/**
 * Picks zero or one candidate. Returning undefined is a valid outcome
 * (nothing chosen), not an error.
 */
export interface BranchSelector {
  select(request: SelectionRequest): Promise<string | undefined>;
}
