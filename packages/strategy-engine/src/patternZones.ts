import {
	readIndicator,
	type Bar,
	type Direction,
	type IndicatorSnapshot,
	type PatternZoneKind,
} from "@momentumx/core";

export interface PatternZone {
	kind: PatternZoneKind;
	direction: Direction;
	top: number;
	bottom: number;
}

const ZONE_KINDS: readonly PatternZoneKind[] = ["fvg", "ob"];

const zonePrefix = (kind: PatternZoneKind, direction: Direction): string =>
	`${kind}_${direction === "LONG" ? "bull" : "bear"}`;

/**
 * Unmitigated zones for a direction. A zone needs both edges; a
 * `<zone>_mitigated` value of 1 removes it.
 */
export const readPatternZones = (
	snapshot: IndicatorSnapshot | undefined,
	direction: Direction
): PatternZone[] => {
	const zones: PatternZone[] = [];
	for (const kind of ZONE_KINDS) {
		const prefix = zonePrefix(kind, direction);
		const top = readIndicator(snapshot, `${prefix}_top`);
		const bottom = readIndicator(snapshot, `${prefix}_bottom`);
		if (top === null || bottom === null) {
			continue;
		}
		if (readIndicator(snapshot, `${prefix}_mitigated`) === 1) {
			continue;
		}
		zones.push({
			kind,
			direction,
			top: Math.max(top, bottom),
			bottom: Math.min(top, bottom),
		});
	}
	return zones;
};

export const barTouchesZone = (
	bar: Bar,
	zone: PatternZone,
	tolerance: number
): boolean =>
	bar.low <= zone.top + tolerance && bar.high >= zone.bottom - tolerance;

/** First zone (FVG before order block) the bar's range reaches. */
export const findTouchedZone = (
	bar: Bar,
	snapshot: IndicatorSnapshot | undefined,
	direction: Direction,
	tolerance: number
): PatternZone | null =>
	readPatternZones(snapshot, direction).find((zone) =>
		barTouchesZone(bar, zone, tolerance)
	) ?? null;
