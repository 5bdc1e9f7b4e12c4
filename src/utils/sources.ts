import type { RagAnswer } from "../services/backend.js";

/**
 * Retrieved chunks of one file, summarized for display
 */
export interface GroupedSource {
  fileId: string;
  fileName: string;
  bestScore: number;
  chunks: number;
  cited: boolean;
}

/**
 * Group the retrieved chunks of an answer by file.
 * Files cited in the answer text come first, then by best score.
 * Cited files that were not among the retrieved chunks are still listed.
 */
export function groupSourcesByFile(answer: RagAnswer): GroupedSource[] {
  const citedIds = new Set(answer.citations.map((c) => c.fileId));
  const groups = new Map<string, GroupedSource>();

  for (const hit of answer.results) {
    const key = hit.fileId || hit.fileName;
    const existing = groups.get(key);
    if (existing) {
      existing.chunks++;
      existing.bestScore = Math.max(existing.bestScore, hit.score);
    } else {
      groups.set(key, {
        fileId: hit.fileId,
        fileName: hit.fileName,
        bestScore: hit.score,
        chunks: 1,
        cited: citedIds.has(hit.fileId),
      });
    }
  }

  for (const citation of answer.citations) {
    const key = citation.fileId || citation.fileName;
    if (!groups.has(key)) {
      groups.set(key, {
        fileId: citation.fileId,
        fileName: citation.fileName,
        bestScore: 0,
        chunks: 0,
        cited: true,
      });
    }
  }

  return Array.from(groups.values()).sort((a, b) => {
    if (a.cited !== b.cited) return a.cited ? -1 : 1;
    return b.bestScore - a.bestScore;
  });
}

/**
 * Format source citations for display
 */
export function formatSourceCitations(groups: GroupedSource[]): string {
  const lines = groups.map((group, i) => {
    const details: string[] = [];
    if (group.chunks > 0) {
      details.push(`score: ${group.bestScore.toFixed(2)}`);
      details.push(`${group.chunks} chunk${group.chunks === 1 ? "" : "s"}`);
    }
    if (group.cited) details.push("cited");
    return `  [${i + 1}] ${group.fileName || group.fileId} (${details.join(", ")})`;
  });
  return lines.join("\n");
}
