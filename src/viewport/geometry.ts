import type { Feature, Geometry } from 'geojson';

export type { Geometry };

/** Geographic coordinate, degrees */
export interface Coordinate {
    readonly latitude: number;
    readonly longitude: number;
}

/** Point in the map view's coordinate space, in screen points */
export interface ScreenPoint {
    readonly x: number;
    readonly y: number;
}

/** Anything an overview can frame */
export type GeometryConvertible = Geometry | Feature<Geometry>;

export function toGeometry(value: GeometryConvertible): Geometry {
    return value.type === 'Feature' ? value.geometry : value;
}

export function coordinatesEqual(a: Coordinate | undefined, b: Coordinate | undefined): boolean {
    if (a === undefined || b === undefined) return a === b;
    return a.latitude === b.latitude && a.longitude === b.longitude;
}

export function screenPointsEqual(a: ScreenPoint | undefined, b: ScreenPoint | undefined): boolean {
    if (a === undefined || b === undefined) return a === b;
    return a.x === b.x && a.y === b.y;
}

/**
 * Structural comparison of plain GeoJSON data (objects, arrays, primitives).
 * Properties holding `undefined` count as absent.
 */
export function geometriesEqual(a: unknown, b: unknown): boolean {
    if (a === b) return true;

    if (Array.isArray(a) || Array.isArray(b)) {
        if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
        return a.every((item, i) => geometriesEqual(item, b[i]));
    }

    if (!isRecord(a) || !isRecord(b)) return false;

    const aKeys = definedKeys(a);
    const bKeys = definedKeys(b);
    if (aKeys.length !== bKeys.length) return false;
    return aKeys.every(key => geometriesEqual(a[key], b[key]));
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

function definedKeys(record: Record<string, unknown>): string[] {
    return Object.keys(record).filter(key => record[key] !== undefined);
}
