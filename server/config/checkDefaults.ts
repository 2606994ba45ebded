/**
 * Thresholds and locale conventions used by the deterministic checks.
 *
 * Number and date readings that are genuinely ambiguous across locales
 * (`1,250` vs `1.250`, `05/06/2024`) are decided here rather than inside
 * the parsers.
 */
export type GroupingOnlyPolicy = "thousands" | "decimal";
export type DateOrder = "DMY" | "MDY";

export interface NumberSettings {
  /** How to read one separator followed by exactly three digits, e.g. `1,250`. */
  groupingOnly: GroupingOnlyPolicy;
  /** Accept space / NBSP as a thousands separator (`1 250 000`). */
  allowSpaceGrouping: boolean;
}

export interface DateSettings {
  order: DateOrder;
}

export interface UntranslatedSettings {
  /** partial-ratio similarity (0-100) at or above which a target looks copied */
  threshold: number;
}

export interface LengthRatioSettings {
  lowerFactor: number;
  upperFactor: number;
  /** below this many non-empty pairs the expected ratio falls back to 1.0 */
  minSegmentsForCorpus: number;
}

export interface NameSettings {
  threshold: number;
  mediumThreshold: number;
}

export interface CheckSettings {
  numbers: NumberSettings;
  dates: DateSettings;
  untranslated: UntranslatedSettings;
  lengthRatio: LengthRatioSettings;
  names: NameSettings;
  snippetLength: number;
}

export type CheckSettingsOverrides = {
  [K in keyof CheckSettings]?: CheckSettings[K] extends object
    ? Partial<CheckSettings[K]>
    : CheckSettings[K];
};

export const DEFAULT_CHECK_SETTINGS: CheckSettings = {
  numbers: {
    groupingOnly: "thousands",
    allowSpaceGrouping: true,
  },
  dates: {
    order: "DMY",
  },
  untranslated: {
    threshold: 90,
  },
  lengthRatio: {
    lowerFactor: 0.5,
    upperFactor: 2.0,
    minSegmentsForCorpus: 3,
  },
  names: {
    threshold: 80,
    mediumThreshold: 90,
  },
  snippetLength: 300,
};

export function resolveCheckSettings(
  overrides: CheckSettingsOverrides = {},
): CheckSettings {
  return {
    numbers: { ...DEFAULT_CHECK_SETTINGS.numbers, ...overrides.numbers },
    dates: { ...DEFAULT_CHECK_SETTINGS.dates, ...overrides.dates },
    untranslated: {
      ...DEFAULT_CHECK_SETTINGS.untranslated,
      ...overrides.untranslated,
    },
    lengthRatio: {
      ...DEFAULT_CHECK_SETTINGS.lengthRatio,
      ...overrides.lengthRatio,
    },
    names: { ...DEFAULT_CHECK_SETTINGS.names, ...overrides.names },
    snippetLength: overrides.snippetLength ?? DEFAULT_CHECK_SETTINGS.snippetLength,
  };
}
