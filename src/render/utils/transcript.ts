export interface TranscriptMetadataEntry {
  label: string;
  value?: string | null;
}

export interface TranscriptOptions {
  metadata?: TranscriptMetadataEntry[];
  sections?: string[][];
}

export function renderTranscript({
  metadata = [],
  sections = [],
}: TranscriptOptions): string {
  const lines: string[] = [];

  const metadataLines = metadata
    .filter((entry): entry is TranscriptMetadataEntry & { value: string } => {
      return typeof entry.value === "string" && entry.value.length > 0;
    })
    .map((entry) => `${entry.label}: ${entry.value}`);

  if (metadataLines.length > 0) {
    lines.push(...metadataLines, "");
  }

  sections.forEach((block, index) => {
    if (block.length === 0) {
      return;
    }

    lines.push(...block);

    if (index < sections.length - 1) {
      lines.push("");
    }
  });

  return trimTrailingBlankLines(lines).join("\n");
}

function trimTrailingBlankLines(lines: string[]): string[] {
  let end = lines.length;
  while (end > 0 && lines[end - 1]?.trim() === "") {
    end -= 1;
  }

  return lines.slice(0, end);
}
