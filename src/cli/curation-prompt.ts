/**
 * Interactive curation confirmation using @clack/prompts.
 */

import * as p from "@clack/prompts";
import type { CurationPrompt } from "../core/curation.js";
import { DEFAULT_CURATION_REASONS } from "../core/curation.js";

export function createTerminalCurationPrompt(): CurationPrompt {
  return {
    async confirm({ verdict, sourceId, summary }) {
      p.note(summary.trimEnd(), sourceId);
      const answer = await p.confirm({
        message: `Are you sure you want to ${verdict} ${sourceId}?`,
        initialValue: false,
      });
      if (p.isCancel(answer)) {
        p.cancel("Curation cancelled.");
        return false;
      }
      return answer;
    },

    async askReason(verdict) {
      const answer = await p.text({
        message: `Please write your reason to ${verdict} (empty for the default)`,
        placeholder: DEFAULT_CURATION_REASONS[verdict],
      });
      // Cancelling here still sends the verdict, with the default reason
      return p.isCancel(answer) ? "" : answer;
    },
  };
}
