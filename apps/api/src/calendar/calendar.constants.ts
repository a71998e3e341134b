/** Shortest accepted search query, enforced by SearchQueryDto */
export const SEARCH_MIN_QUERY_LENGTH = 3;

export const DEFAULT_PAGE_SIZE = 100;

export const MAX_PAGE_SIZE = 1000;
