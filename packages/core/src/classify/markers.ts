/**
 * Test marker tables
 */

export interface PathMarker {
  label: string;
  pattern: RegExp;
}

/** Matched against the lowercased, slash-normalized path */
export const TEST_PATH_MARKERS: readonly PathMarker[] = [
  { label: 'tests/', pattern: /(^|\/)tests?\// },
  { label: '__tests__/', pattern: /(^|\/)__tests__\// },
  { label: 'spec/', pattern: /(^|\/)spec\// },
  { label: 'fixtures/', pattern: /(^|\/)fixtures?\// },
  { label: 'examples/', pattern: /(^|\/)examples?\// },
  { label: 'samples/', pattern: /(^|\/)samples?\// },
  { label: 'mocks/', pattern: /(^|\/)mocks?\// },
  { label: 'demos/', pattern: /(^|\/)demos?\// },
  { label: 'test_*', pattern: /(^|\/)test_[^/]*$/ },
  { label: '*_test', pattern: /_test(\.[^/]*)?$/ },
  { label: '*.test.*', pattern: /\.(test|spec)\.[^/]+$/ },
];

export const TEST_FILENAME_WORDS = ['test', 'sample', 'example', 'dummy', 'fixture', 'mock', 'demo'] as const;

export const VALUE_MARKERS = ['TEST', 'EXAMPLE', 'DUMMY', 'SAMPLE', 'MOCK', 'FAKE', 'PLACEHOLDER', 'XXX'] as const;

/** Placeholder fragments that give away a short value */
export const OBVIOUS_PLACEHOLDERS = ['000000', '123456', 'ABCDEF'] as const;

export const EXPIRY_WORDS_ON_VALID = ['expired', 'invalid', 'revoked'] as const;
export const EXPIRY_WORDS_ON_INVALID = ['expired', 'expiry', 'revoked'] as const;
