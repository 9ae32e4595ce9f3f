type SuggestQuery =
  | {
      kind: 'street';
      prefix: string;
    }
  | {
      kind: 'house-number';
      street: string;
      prefix: string;
    };

type SuggestSuccess = {
  success: true;
  suggestions: string[];
};

type SuggestFailure = {
  success: false;
  error: string;
  errorCode: 'network' | 'http' | 'parse';
};

type SuggestResult = SuggestSuccess | SuggestFailure;

/**
 * The autocomplete collaborator: at most one page of suggestions
 * (the service caps it at 12) for a street or house-number prefix.
 */
type SuggestFn = (query: SuggestQuery) => Promise<SuggestResult>;

export type {
  SuggestQuery,
  SuggestSuccess,
  SuggestFailure,
  SuggestResult,
  SuggestFn,
};
