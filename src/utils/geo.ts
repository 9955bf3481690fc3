import type { LonLat } from "../types";

const EARTH_RADIUS_METERS = 6371000;

export type SegmentProjection = {
  segmentIndex: number;
  /** Position along the segment, clamped to [0, 1]. */
  t: number;
  /** Unclamped position; above 1 on the final segment means past the end. */
  rawT: number;
  alongMeters: number;
  distanceMeters: number;
  projectedPoint: LonLat;
};

export function toRadians(value: number): number {
  return (value * Math.PI) / 180;
}

export function toDegrees(value: number): number {
  return (value * 180) / Math.PI;
}

export function haversineMeters(a: LonLat, b: LonLat): number {
  const dLat = toRadians(b[1] - a[1]);
  const dLng = toRadians(b[0] - a[0]);
  const lat1 = toRadians(a[1]);
  const lat2 = toRadians(b[1]);

  const sinLat = Math.sin(dLat / 2);
  const sinLng = Math.sin(dLng / 2);
  const aa =
    sinLat * sinLat + Math.cos(lat1) * Math.cos(lat2) * sinLng * sinLng;
  return 2 * EARTH_RADIUS_METERS * Math.atan2(Math.sqrt(aa), Math.sqrt(1 - aa));
}

function toXY(point: LonLat, refLatRad: number): { x: number; y: number } {
  return {
    x: EARTH_RADIUS_METERS * toRadians(point[0]) * Math.cos(refLatRad),
    y: EARTH_RADIUS_METERS * toRadians(point[1]),
  };
}

export function buildCumulativeMeters(geometry: LonLat[]): number[] {
  if (geometry.length === 0) return [];

  const cumulative: number[] = [0];
  let total = 0;
  for (let i = 1; i < geometry.length; i += 1) {
    total += haversineMeters(geometry[i - 1], geometry[i]);
    cumulative.push(total);
  }
  return cumulative;
}

export function projectOntoSegment(
  point: LonLat,
  start: LonLat,
  end: LonLat,
): { t: number; rawT: number; projectedPoint: LonLat } {
  const refLatRad = toRadians((start[1] + end[1]) / 2);
  const startXY = toXY(start, refLatRad);
  const endXY = toXY(end, refLatRad);
  const pointXY = toXY(point, refLatRad);

  const segmentX = endXY.x - startXY.x;
  const segmentY = endXY.y - startXY.y;
  const segmentLengthSq = segmentX * segmentX + segmentY * segmentY;

  let rawT = 0;
  if (segmentLengthSq > 0) {
    rawT =
      ((pointXY.x - startXY.x) * segmentX +
        (pointXY.y - startXY.y) * segmentY) /
      segmentLengthSq;
  }
  const t = Math.min(1, Math.max(0, rawT));

  // exact vertices at the ends keep shared-vertex ties comparable
  let projectedPoint: LonLat;
  if (t === 0) {
    projectedPoint = [start[0], start[1]];
  } else if (t === 1) {
    projectedPoint = [end[0], end[1]];
  } else {
    projectedPoint = [
      start[0] + (end[0] - start[0]) * t,
      start[1] + (end[1] - start[1]) * t,
    ];
  }

  return { t, rawT, projectedPoint };
}

/**
 * Nearest point on the polyline among segments `fromSegment..last`.
 * Equal distances resolve to the later segment.
 */
export function projectOntoPolyline(
  point: LonLat,
  geometry: LonLat[],
  cumulativeMeters: number[],
  fromSegment = 0,
): SegmentProjection | null {
  if (geometry.length === 0) return null;

  if (geometry.length === 1) {
    const vertex: LonLat = [geometry[0][0], geometry[0][1]];
    return {
      segmentIndex: 0,
      t: 0,
      rawT: 0,
      alongMeters: 0,
      distanceMeters: haversineMeters(point, vertex),
      projectedPoint: vertex,
    };
  }

  const lastSegment = geometry.length - 2;
  const first = Math.min(Math.max(0, fromSegment), lastSegment);
  let best: SegmentProjection | null = null;

  for (let i = first; i <= lastSegment; i += 1) {
    const projection = projectOntoSegment(point, geometry[i], geometry[i + 1]);
    const distance = haversineMeters(point, projection.projectedPoint);

    if (best === null || distance <= best.distanceMeters) {
      const segmentLength = cumulativeMeters[i + 1] - cumulativeMeters[i];
      best = {
        segmentIndex: i,
        t: projection.t,
        rawT: projection.rawT,
        alongMeters: cumulativeMeters[i] + segmentLength * projection.t,
        distanceMeters: distance,
        projectedPoint: projection.projectedPoint,
      };
    }
  }

  return best;
}

function decodeValue(
  encoded: string,
  start: number,
): { value: number; next: number } {
  let index = start;
  let shift = 0;
  let result = 0;
  let byte: number;

  do {
    if (index >= encoded.length) {
      throw new Error("Truncated polyline");
    }
    byte = encoded.charCodeAt(index) - 63;
    index += 1;
    result |= (byte & 0x1f) << shift;
    shift += 5;
  } while (byte >= 0x20);

  const value = result & 1 ? ~(result >> 1) : result >> 1;
  return { value, next: index };
}

/** Google encoded polyline, returned as [lon, lat] pairs. */
export function decodePolyline(encoded: string, precision = 5): LonLat[] {
  const factor = 10 ** precision;
  const coordinates: LonLat[] = [];
  let index = 0;
  let lat = 0;
  let lng = 0;

  while (index < encoded.length) {
    const latStep = decodeValue(encoded, index);
    const lngStep = decodeValue(encoded, latStep.next);
    index = lngStep.next;
    lat += latStep.value;
    lng += lngStep.value;
    coordinates.push([lng / factor, lat / factor]);
  }

  return coordinates;
}

/** Shift a point by metres east/north; used by fixtures and replays. */
export function offsetMeters(
  point: LonLat,
  eastMeters: number,
  northMeters: number,
): LonLat {
  const metersPerDegLat = (Math.PI * EARTH_RADIUS_METERS) / 180;
  const metersPerDegLng = Math.max(
    1,
    metersPerDegLat * Math.cos(toRadians(point[1])),
  );
  return [
    point[0] + eastMeters / metersPerDegLng,
    point[1] + northMeters / metersPerDegLat,
  ];
}
