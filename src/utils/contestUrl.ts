export type ContestId = { kind: "id"; id: number } | { kind: "uri"; uri: string };

/**
 * A bare positive integer names a contest on the configured host; anything else
 * is taken literally as the contest URI.
 */
export function parseContestId(raw: string): ContestId {
  const trimmed = raw.trim();
  if (/^\+?\d+$/.test(trimmed)) {
    const id = Number(trimmed);
    if (Number.isSafeInteger(id) && id > 0) {
      return { kind: "id", id };
    }
  }
  return { kind: "uri", uri: raw };
}

export function buildContestUrl(contest: ContestId, baseUrl: string): string {
  if (contest.kind === "id") {
    return `${baseUrl.replace(/\/+$/, "")}/contest/${contest.id}`;
  }
  return contest.uri.replace(/\/+$/, "");
}

export function buildProblemUrl(contestUri: string, problemId: string): string {
  return `${contestUri}/problem/${problemId}`;
}
