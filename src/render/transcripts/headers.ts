import type { PreparedHeaders } from "../../headers/builder.js";
import { renderTranscript } from "../utils/transcript.js";

export function renderHeadersTranscript(result: PreparedHeaders): string {
  const declarationCount = result.declarations
    .split("\n")
    .filter((line) => line.trim().length > 0).length;

  return renderTranscript({
    metadata: [
      { label: "Declarations", value: result.mainHeader },
      { label: "Include path", value: result.includeDir },
      { label: "Patched path", value: result.patchedDir },
    ],
    sections: [
      [
        `Patched ${result.patchedHeaderCount} header(s); ${declarationCount} declaration line(s) written.`,
      ],
    ],
  });
}
