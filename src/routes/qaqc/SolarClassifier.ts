import { DayNight, GeoCoordinates } from "../../types";
import { degreesToRadians, radiansToDegrees, normalizeDegrees } from "../normalization/converters";

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const JULIAN_UNIX_EPOCH = 2440587.5;
const J2000 = 2451545;

export interface SolarPosition {
    /** Geometric solar elevation above the horizon, in degrees (no refraction). */
    elevation: number;
    /** Solar declination, in degrees. */
    declination: number;
    /** Equation of time, in minutes. */
    equationOfTime: number;
    /** Hour angle, in degrees (negative before solar noon). */
    hourAngle: number;
    isDay: boolean;
}

/**
 * Computes the position of the sun for a UTC instant using the NOAA solar calculator formulas
 * (mean anomaly, equation of centre, apparent longitude, obliquity, equation of time, hour angle).
 * The result only depends on the inputs, so diurnal bins are reproducible between threshold rebuilds.
 */
export function solarPosition(date: Date, coordinates: GeoCoordinates): SolarPosition {
    const [latitude, longitude] = coordinates;

    const julianDay = date.getTime() / MS_PER_DAY + JULIAN_UNIX_EPOCH;
    const t = (julianDay - J2000) / 36525;

    const meanLongitude = normalizeDegrees(280.46646 + t * (36000.76983 + t * 0.0003032));
    const meanAnomaly = 357.52911 + t * (35999.05029 - 0.0001537 * t);
    const eccentricity = 0.016708634 - t * (0.000042037 + 0.0000001267 * t);

    const m = degreesToRadians(meanAnomaly);
    const equationOfCentre =
        Math.sin(m) * (1.914602 - t * (0.004817 + 0.000014 * t)) +
        Math.sin(2 * m) * (0.019993 - 0.000101 * t) +
        Math.sin(3 * m) * 0.000289;

    const trueLongitude = meanLongitude + equationOfCentre;
    const omega = degreesToRadians(125.04 - 1934.136 * t);
    const apparentLongitude = degreesToRadians(trueLongitude - 0.00569 - 0.00478 * Math.sin(omega));

    const meanObliquity = 23 + (26 + (21.448 - t * (46.815 + t * (0.00059 - t * 0.001813))) / 60) / 60;
    const obliquity = degreesToRadians(meanObliquity + 0.00256 * Math.cos(omega));

    const declination = Math.asin(Math.sin(obliquity) * Math.sin(apparentLongitude));

    const y = Math.tan(obliquity / 2) ** 2;
    const l0 = degreesToRadians(meanLongitude);
    const equationOfTime = 4 * radiansToDegrees(
        y * Math.sin(2 * l0) -
        2 * eccentricity * Math.sin(m) +
        4 * eccentricity * y * Math.sin(m) * Math.cos(2 * l0) -
        0.5 * y * y * Math.sin(4 * l0) -
        1.25 * eccentricity * eccentricity * Math.sin(2 * m)
    );

    const minutesOfDay = (date.getTime() % MS_PER_DAY + MS_PER_DAY) % MS_PER_DAY / 60000;
    const trueSolarTime = ((minutesOfDay + equationOfTime + 4 * longitude) % 1440 + 1440) % 1440;
    let hourAngle = trueSolarTime / 4 - 180;
    if (hourAngle < -180) hourAngle += 360;

    const lat = degreesToRadians(latitude);
    const cosZenith =
        Math.sin(lat) * Math.sin(declination) +
        Math.cos(lat) * Math.cos(declination) * Math.cos(degreesToRadians(hourAngle));
    const zenith = Math.acos(Math.min(1, Math.max(-1, cosZenith)));
    const elevation = 90 - radiansToDegrees(zenith);

    return {
        elevation,
        declination: radiansToDegrees(declination),
        equationOfTime,
        hourAngle,
        isDay: elevation > 0
    };
}

/** Day when the sun is above the geometric horizon, Night otherwise. */
export function classifyDayNight(date: Date, coordinates: GeoCoordinates): DayNight {
    return solarPosition(date, coordinates).isDay ? "Day" : "Night";
}
