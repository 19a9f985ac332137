/**
 * Bibliographic references and publication years.
 *
 * @packageDocumentation
 */

/**
 * Publication year of a result. Trivial, conjectured and some derived results
 * carry no date.
 */
export type PublicationYear =
  | { readonly kind: 'known'; readonly value: number }
  | { readonly kind: 'unknown' };

/**
 * The undated publication year.
 */
export const UNKNOWN_YEAR: PublicationYear = Object.freeze({ kind: 'unknown' });

/**
 * Creates a known publication year.
 *
 * @throws RangeError if the year is not an integer.
 */
export function knownYear(value: number): PublicationYear {
  if (!Number.isInteger(value)) {
    throw new RangeError(`Publication year must be an integer, got ${String(value)}`);
  }
  return { kind: 'known', value };
}

/**
 * Returns true when a result with this year may be used at the given cutoff.
 * Undated results are always available.
 */
export function isAvailableBy(year: PublicationYear, cutoff: number): boolean {
  return year.kind === 'unknown' || year.value <= cutoff;
}

/**
 * Formats a publication year for proof narratives.
 */
export function formatYear(year: PublicationYear): string {
  return year.kind === 'known' ? String(year.value) : 'Unknown date';
}

/**
 * Origin category of a reference.
 */
export type ReferenceKind = 'literature' | 'trivial' | 'conjectured' | 'derived';

/**
 * A bibliographic reference: an author and year from the literature, or one of
 * the synthetic categories for trivial, conjectured and derived results.
 */
export class Reference {
  readonly kind: ReferenceKind;
  private readonly authorName: string;
  private readonly published: PublicationYear;

  private constructor(kind: ReferenceKind, authorName: string, published: PublicationYear) {
    this.kind = kind;
    this.authorName = authorName;
    this.published = published;
  }

  /**
   * A published result.
   *
   * @param author - Author list as it should appear in citations.
   * @param year - Year of publication.
   */
  static literature(author: string, year: number): Reference {
    return new Reference('literature', author, knownYear(year));
  }

  static trivial(): Reference {
    return new Reference('trivial', 'Trivial', UNKNOWN_YEAR);
  }

  static conjectured(): Reference {
    return new Reference('conjectured', 'Conjecture', UNKNOWN_YEAR);
  }

  /**
   * A result derived from other results; dated by its latest dependency.
   */
  static derived(year: PublicationYear): Reference {
    return new Reference('derived', 'Derived', year);
  }

  /**
   * Returns the latest known year among the references, or {@link UNKNOWN_YEAR}
   * when none of them is dated.
   */
  static maxYear(references: Iterable<Reference>): PublicationYear {
    let latest: PublicationYear = UNKNOWN_YEAR;
    for (const reference of references) {
      const year = reference.year();
      if (year.kind === 'known' && (latest.kind === 'unknown' || year.value > latest.value)) {
        latest = year;
      }
    }
    return latest;
  }

  author(): string {
    return this.authorName;
  }

  year(): PublicationYear {
    return this.published;
  }

  toString(): string {
    return `[${this.authorName}, ${formatYear(this.published)}]`;
  }
}
