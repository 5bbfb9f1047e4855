/**
 * Thread filter type definitions.
 * Filters hide catalog threads whose subject and/or comment match a keyword.
 */

export const FilterScope = {
  Subject: 'subject',
  Comment: 'comment',
  Both: 'both',
} as const;
export type FilterScope = (typeof FilterScope)[keyof typeof FilterScope];

export interface ThreadFilter {
  /** Unique within its board only */
  readonly id: number;
  readonly keyword: string;
  readonly scope: FilterScope;
  readonly caseSensitive: boolean;
  readonly isRegex: boolean;
  readonly enabled: boolean;
}

/** Fields accepted when creating a filter */
export interface ThreadFilterInput {
  readonly keyword: string;
  readonly scope?: FilterScope | undefined;
  readonly caseSensitive?: boolean | undefined;
  readonly isRegex?: boolean | undefined;
  readonly enabled?: boolean | undefined;
}

/** Fields accepted when updating a filter; absent fields keep their value */
export interface ThreadFilterPatch {
  readonly keyword?: string | undefined;
  readonly scope?: FilterScope | undefined;
  readonly caseSensitive?: boolean | undefined;
  readonly isRegex?: boolean | undefined;
  readonly enabled?: boolean | undefined;
}

/** On-disk format of filters.json */
export interface FiltersFile {
  readonly version: 1;
  readonly boards: Readonly<Record<string, readonly ThreadFilter[]>>;
  /** Next id to hand out, per board; never decreases */
  readonly nextIds: Readonly<Record<string, number>>;
}

/** Text fields of a catalog thread that filters look at */
export interface FilterableThread {
  readonly sub?: string | undefined;
  readonly com?: string | undefined;
}
