import { AlignConfigError } from './errors'

export const DEFAULT_ALIGN_CONFIG = {
	// Matching
	matchThreshold: 0.4,
	maxLookahead: 100,
	repeatedLineLookahead: 150,
	repeatedThresholdStep: 0.01,
	repeatedThresholdFloor: 0.35,
	windowShrink: 2,
	windowGrow: 4,
	exactMatchMultiplier: 2,
	wholeLineBonus: 1.2,
	defaultConfidence: 0,
	// Interpolation
	gapReserve: 0.1,
	breakRatio: 3,
	minBreakSeconds: 5,
	defaultLineSeconds: 4,
	defaultSecondsPerWord: 0.5,
} as const

export type AlignConfig = {
	-readonly [Key in keyof typeof DEFAULT_ALIGN_CONFIG]: number
}

type ConfigRule = {
	min: number
	max?: number
	integer?: boolean
	exclusiveMin?: boolean
}

const CONFIG_RULES: Record<keyof AlignConfig, ConfigRule> = {
	matchThreshold: { min: 0 },
	maxLookahead: { min: 1, integer: true },
	repeatedLineLookahead: { min: 1, integer: true },
	repeatedThresholdStep: { min: 0 },
	repeatedThresholdFloor: { min: 0 },
	windowShrink: { min: 0, integer: true },
	windowGrow: { min: 0, integer: true },
	exactMatchMultiplier: { min: 1 },
	wholeLineBonus: { min: 1 },
	defaultConfidence: { min: 0, max: 1 },
	gapReserve: { min: 0, max: 0.9 },
	breakRatio: { min: 1, exclusiveMin: true },
	minBreakSeconds: { min: 0 },
	defaultLineSeconds: { min: 0, exclusiveMin: true },
	defaultSecondsPerWord: { min: 0, exclusiveMin: true },
}

function isConfigKey(key: string): key is keyof AlignConfig {
	return Object.hasOwn(CONFIG_RULES, key)
}

function checkValue(key: keyof AlignConfig, value: number) {
	const rule = CONFIG_RULES[key]
	if (!Number.isFinite(value)) {
		throw new AlignConfigError(key, value, 'must be a finite number')
	}
	if (rule.integer && !Number.isInteger(value)) {
		throw new AlignConfigError(key, value, 'must be an integer')
	}
	if (rule.exclusiveMin ? value <= rule.min : value < rule.min) {
		throw new AlignConfigError(
			key,
			value,
			`must be ${rule.exclusiveMin ? 'greater than' : 'at least'} ${rule.min}`,
		)
	}
	if (rule.max !== undefined && value > rule.max) {
		throw new AlignConfigError(key, value, `must be at most ${rule.max}`)
	}
}

/**
 * Merge overrides onto the defaults. Undefined overrides keep the default;
 * anything out of range throws an AlignConfigError.
 */
export function resolveAlignConfig(
	overrides: Partial<AlignConfig> = {},
): AlignConfig {
	const config: AlignConfig = { ...DEFAULT_ALIGN_CONFIG }
	for (const [key, value] of Object.entries(overrides)) {
		if (!isConfigKey(key)) {
			throw new AlignConfigError(key, value, 'is not a known option')
		}
		if (value === undefined) {
			continue
		}
		checkValue(key, value)
		config[key] = value
	}
	if (config.repeatedLineLookahead < config.maxLookahead) {
		throw new AlignConfigError(
			'repeatedLineLookahead',
			config.repeatedLineLookahead,
			`must be at least maxLookahead (${config.maxLookahead})`,
		)
	}
	return config
}
