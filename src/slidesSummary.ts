import { z } from 'zod';

const textContentSchema = z.object({ content: z.string().optional() });

const shapeSchema = z.object({
  placeholder: z.object({ type: z.string().optional() }).optional(),
  text: z
    .object({
      textElements: z
        .array(
          z.object({
            textRun: textContentSchema.optional(),
            autoText: textContentSchema.optional(),
          }),
        )
        .optional(),
    })
    .optional(),
});

export const googlePresentationSchema = z.object({
  presentationId: z.string().optional(),
  title: z.string().optional(),
  slides: z
    .array(
      z.object({
        objectId: z.string().optional(),
        pageElements: z.array(z.object({ shape: shapeSchema.optional() })).optional(),
      }),
    )
    .optional(),
});

export type GooglePresentation = z.infer<typeof googlePresentationSchema>;
type Shape = z.infer<typeof shapeSchema>;

export type SlideSummary = {
  index: number;
  pageObjectId: string | null;
  title: string;
  subtitle: string;
  body: string;
  allText: string;
};

export type PresentationSummary = {
  presentationId: string | null;
  title: string | null;
  slideCount: number;
  slides: SlideSummary[];
};

type ShapeKind = 'title' | 'subtitle' | 'body' | 'other';

function shapeKind(shape: Shape): ShapeKind {
  switch (shape.placeholder?.type) {
    case 'TITLE':
    case 'CENTERED_TITLE':
      return 'title';
    case 'SUBTITLE':
      return 'subtitle';
    case 'BODY':
      return 'body';
    default:
      return 'other';
  }
}

function shapeText(shape: Shape): string {
  return (shape.text?.textElements ?? [])
    .map((element) => element.textRun?.content ?? element.autoText?.content ?? '')
    .join('')
    .trim();
}

export function summarizePresentation(presentation: GooglePresentation): PresentationSummary {
  const slides = (presentation.slides ?? []).map((slide, position): SlideSummary => {
    let title = '';
    let subtitle = '';
    let body = '';
    const allText: string[] = [];

    for (const element of slide.pageElements ?? []) {
      const shape = element.shape;
      if (!shape?.text) continue;
      const text = shapeText(shape);
      if (!text) continue;

      const kind = shapeKind(shape);
      if (kind === 'title' && !title) {
        title = text;
      } else if (kind === 'subtitle' && !subtitle) {
        subtitle = text;
      } else if (kind === 'body') {
        body = body ? `${body}\n${text}` : text;
      }
      allText.push(text);
    }

    return {
      index: position + 1,
      pageObjectId: slide.objectId ?? null,
      title,
      subtitle,
      body,
      allText: allText.join('\n'),
    };
  });

  return {
    presentationId: presentation.presentationId ?? null,
    title: presentation.title ?? null,
    slideCount: slides.length,
    slides,
  };
}
