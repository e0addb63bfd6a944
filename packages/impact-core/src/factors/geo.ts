export const EARTH_RADIUS_KM = 6371;

export interface GeoPoint {
    lat: number;
    lon: number;
}

function toRadians(deg: number): number {
    return (deg * Math.PI) / 180;
}

/** Great-circle distance (haversine). */
export function haversineKm(from: GeoPoint, to: GeoPoint): number {
    const lat1 = toRadians(from.lat);
    const lat2 = toRadians(to.lat);
    const dLat = lat2 - lat1;
    const dLon = toRadians(to.lon) - toRadians(from.lon);

    const a =
        Math.sin(dLat / 2) ** 2 +
        Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) ** 2;
    const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
    return EARTH_RADIUS_KM * c;
}
