import { describe, expect, it } from 'vitest';
import { extractDocumentText, googleDocumentSchema } from './docsText.js';

const run = (content: string) => ({ textRun: { content } });

describe('extractDocumentText', () => {
  it('joins paragraphs, tables and section breaks into lines', () => {
    const document = googleDocumentSchema.parse({
      documentId: 'doc-1',
      title: 'Quarterly notes',
      revisionId: 'ignored',
      body: {
        content: [
          { sectionBreak: { sectionStyle: {} } },
          { paragraph: { elements: [run('Hello '), run('world\n')] } },
          {
            table: {
              tableRows: [
                {
                  tableCells: [
                    { content: [{ paragraph: { elements: [run('Name\n')] } }] },
                    { content: [{ paragraph: { elements: [run('Role\n')] } }] },
                  ],
                },
                {
                  tableCells: [
                    {
                      content: [
                        { paragraph: { elements: [run('Ada\n')] } },
                        { paragraph: { elements: [run('Lovelace\n')] } },
                      ],
                    },
                    { content: [{ paragraph: { elements: [run('\n')] } }] },
                  ],
                },
              ],
            },
          },
          { sectionBreak: {} },
          { paragraph: { elements: [{ inlineObjectElement: {} }, run('  Closing line  \n')] } },
        ],
      },
    });

    expect(extractDocumentText(document)).toEqual({
      documentId: 'doc-1',
      title: 'Quarterly notes',
      text: 'Hello world\nName | Role\nAda Lovelace\n\nClosing line',
    });
  });

  it('handles an empty document', () => {
    expect(extractDocumentText(googleDocumentSchema.parse({}))).toEqual({
      documentId: null,
      title: null,
      text: '',
    });
  });
});
