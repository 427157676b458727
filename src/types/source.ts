/**
 * External providers that can contribute identifiers for canonical records.
 * The schedule provider owns canonical game ids and is not listed here.
 */
export const API_SOURCES = ['espn'] as const;

export type ApiSource = (typeof API_SOURCES)[number];
