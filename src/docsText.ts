import { z } from 'zod';

const textElementSchema = z.object({
  textRun: z.object({ content: z.string().optional() }).optional(),
});

const paragraphSchema = z.object({
  elements: z.array(textElementSchema).optional(),
});

const tableCellSchema = z.object({
  content: z.array(z.object({ paragraph: paragraphSchema.optional() })).optional(),
});

const tableSchema = z.object({
  tableRows: z.array(z.object({ tableCells: z.array(tableCellSchema).optional() })).optional(),
});

const structuralElementSchema = z.object({
  paragraph: paragraphSchema.optional(),
  table: tableSchema.optional(),
  sectionBreak: z.unknown().optional(),
});

export const googleDocumentSchema = z.object({
  documentId: z.string().optional(),
  title: z.string().optional(),
  body: z.object({ content: z.array(structuralElementSchema).optional() }).optional(),
});

export type GoogleDocument = z.infer<typeof googleDocumentSchema>;

export type DocumentText = {
  documentId: string | null;
  title: string | null;
  text: string;
};

type Paragraph = z.infer<typeof paragraphSchema>;

function paragraphText(paragraph: Paragraph | undefined): string {
  return (paragraph?.elements ?? []).map((element) => element.textRun?.content ?? '').join('');
}

/** Flattens a Docs API document body to plain text; table rows become `a | b | c`. */
export function extractDocumentText(document: GoogleDocument): DocumentText {
  const lines: string[] = [];
  for (const element of document.body?.content ?? []) {
    if (element.paragraph) {
      lines.push(paragraphText(element.paragraph));
    } else if (element.table) {
      for (const row of element.table.tableRows ?? []) {
        const cells = (row.tableCells ?? [])
          .map((cell) =>
            (cell.content ?? [])
              .map((item) => paragraphText(item.paragraph).trim())
              .filter((text) => text.length > 0)
              .join(' '),
          )
          .filter((text) => text.length > 0);
        lines.push(cells.join(' | '));
      }
    } else if (element.sectionBreak !== undefined) {
      lines.push('');
    }
  }

  return {
    documentId: document.documentId ?? null,
    title: document.title ?? null,
    text: lines
      .map((line) => line.trim())
      .join('\n')
      .trim(),
  };
}
