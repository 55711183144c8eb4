import type { GeoTile } from './types.js';

export const tileWidth = (tile: GeoTile): number => tile.east - tile.west;
export const tileHeight = (tile: GeoTile): number => tile.north - tile.south;
export const tileArea = (tile: GeoTile): number => tileWidth(tile) * tileHeight(tile);

/** Returns the reasons a box is not a usable, non-wrapping tile (empty when valid). */
export const validateTile = (tile: GeoTile): string[] => {
    const issues: string[] = [];
    const values = [tile.north, tile.south, tile.east, tile.west];
    if (values.some((value) => !Number.isFinite(value))) {
        return ['tile coordinates must be finite numbers'];
    }
    if (tile.north > 90 || tile.south < -90) issues.push('latitudes must lie within [-90, 90]');
    if (tile.east > 180 || tile.west < -180) issues.push('longitudes must lie within [-180, 180]');
    if (!(tile.north > tile.south)) issues.push('north must be greater than south');
    if (!(tile.east > tile.west)) issues.push('east must be greater than west');
    return issues;
};

/**
 * Splits a tile into NW, NE, SW, SE quadrants. The midpoints are computed once and shared by the
 * neighbouring children, so the quadrants meet exactly and cover the parent.
 */
export const subdivide = (tile: GeoTile): [GeoTile, GeoTile, GeoTile, GeoTile] => {
    const midLat = (tile.north + tile.south) / 2;
    const midLng = (tile.east + tile.west) / 2;
    return [
        { north: tile.north, south: midLat, west: tile.west, east: midLng },
        { north: tile.north, south: midLat, west: midLng, east: tile.east },
        { north: midLat, south: tile.south, west: tile.west, east: midLng },
        { north: midLat, south: tile.south, west: midLng, east: tile.east },
    ];
};

/** A tile at or below the floor in either dimension is never split further. */
export const isAtFloor = (tile: GeoTile, minTileSizeDeg: number): boolean =>
    tileWidth(tile) <= minTileSizeDeg || tileHeight(tile) <= minTileSizeDeg;

/** Upper bound on subdivision depth: `ceil(log4(rootArea / floor²))`, 0 when the root is already small. */
export const maxTileDepth = (root: GeoTile, minTileSizeDeg: number): number => {
    const ratio = tileArea(root) / (minTileSizeDeg * minTileSizeDeg);
    return ratio <= 1 ? 0 : Math.ceil(Math.log(ratio) / Math.log(4));
};

export const describeTile = (tile: GeoTile): string =>
    `[${tile.south.toFixed(5)},${tile.west.toFixed(5)} → ${tile.north.toFixed(5)},${tile.east.toFixed(5)}]`;
