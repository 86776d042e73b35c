export const MAIN_BRANCH = "main";
export const PAGES_BRANCH = "gh-pages";

/** Same task + nonce always lands in the same repository, whatever the round. */
export function repoNameFor(task: string, nonce: string): string {
  return `${task}-${nonce}`.toLowerCase().replaceAll(" ", "-");
}

export function branchForRound(round: number): string {
  return round === 1 ? MAIN_BRANCH : `round-${round}`;
}

export function pagesUrlFor(owner: string, repo: string): string {
  return `https://${owner}.github.io/${repo}/`;
}
