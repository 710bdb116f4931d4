import { z } from 'zod';

// Optional fields with an unexpected type fall back to "absent" instead of
// failing the whole record.
function lenient<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().catch(undefined);
}

// Elements that don't match are dropped; a non-array becomes absent.
function lenientArray<T extends z.ZodTypeAny>(element: T) {
  return lenient(z.array(z.unknown())).transform((items) =>
    items?.flatMap((item): z.output<T>[] => {
      const parsed = element.safeParse(item);
      return parsed.success ? [parsed.data] : [];
    })
  );
}

const locator = lenient(z.union([z.string(), z.number()]).transform((value) => String(value)));

const LabelSchema = z.object({ label: lenient(z.string()) }).passthrough();

export const IdentifierSchema = z
  .object({
    source: lenient(z.object({ type: lenient(LabelSchema) }).passthrough()),
    realUrl: lenient(z.string()),
  })
  .passthrough();

export const AuthorshipSchema = z
  .object({
    givenName: lenient(z.string()),
    familyName: lenient(z.string()),
    listPosition: lenient(z.number()),
    authorTyped: lenient(z.boolean()),
    author: lenient(z.object({ mtid: lenient(z.number()) }).passthrough()),
  })
  .passthrough();

export const JournalSchema = z
  .object({
    title: lenient(z.string()),
    label: lenient(z.string()),
  })
  .passthrough();

export const BookSchema = z
  .object({
    title: lenient(z.string()),
    publishedAt: lenientArray(
      z
        .object({
          label: lenient(z.string()),
          partOf: lenient(LabelSchema),
        })
        .passthrough()
    ),
  })
  .passthrough();

/**
 * Only a non-object record or a non-numeric `publishedYear` is rejected;
 * every other field degrades to absent.
 */
export const RawPublicationSchema = z
  .object({
    mtid: lenient(z.number()),
    title: lenient(z.string()),
    publishedYear: z.number().nullish(),
    citingPubCount: lenient(z.number()),
    type: lenient(LabelSchema),
    subType: lenient(z.object({ nameEng: lenient(z.string()) }).passthrough()),
    journal: lenient(JournalSchema),
    book: lenient(BookSchema),
    conferencePublication: lenient(z.boolean()),
    volume: locator,
    issue: locator,
    firstPage: locator,
    lastPage: locator,
    identifiers: lenientArray(IdentifierSchema),
    authorships: lenientArray(AuthorshipSchema),
  })
  .passthrough();

export const PublicationPageSchema = z
  .object({
    content: z.array(z.unknown()).nullish(),
    paging: z.object({ last: z.boolean().nullish() }).passthrough().nullish(),
  })
  .passthrough();

export type Authorship = z.infer<typeof AuthorshipSchema>;
export type Journal = z.infer<typeof JournalSchema>;
export type Book = z.infer<typeof BookSchema>;
export type RawPublication = z.infer<typeof RawPublicationSchema>;
export type PublicationPage = z.infer<typeof PublicationPageSchema>;

export type PublicationType = 'journal' | 'conference';
export type PublisherLabel = 'IEEE' | 'Springer' | '';

export interface NormalizedPublication {
  readonly title: string;
  readonly link: string | null;
  readonly authors: string;
  readonly venue: string;
  readonly type: PublicationType;
  readonly publisher: PublisherLabel;
  readonly citations: number;
  readonly year: number;
}

export interface AuthorQuery {
  authorId: number;
  pageSize: number;
  sort: string;
  labelLang: string;
}
