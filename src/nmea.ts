/**
 * NMEA 0183 sentence parsing for the GPS status record.
 * Only GGA (fix quality) and VTG (course and speed) carry fields we publish.
 */

import { ParseError } from './errors';
import { Result, err, ok } from './utils';

export interface GgaSentence {
    type: 'GGA';
    talker: string;
    fix: boolean;
    /** null when the receiver leaves the field empty, as it does without a fix */
    numSatellites: number | null;
    horizontalDilution: number | null;
}

export interface VtgSentence {
    type: 'VTG';
    talker: string;
    /** null when the speed field is empty or unparseable */
    kmph: number | null;
    /** null when no true track is reported */
    trueTrack: number | null;
}

export interface OtherSentence {
    type: 'OTHER';
    talker: string;
    sentenceType: string;
}

export type NmeaSentence = GgaSentence | VtgSentence | OtherSentence;

const SENTENCE_PATTERN = /^[$!]([A-Z]{2})([A-Z0-9]{3}),(.*?)(?:\*([0-9A-Fa-f]{2}))?$/;

export function nmeaChecksum(body: string): number {
    let checksum = 0;
    for (let i = 0; i < body.length; i++) {
        checksum ^= body.charCodeAt(i);
    }
    return checksum;
}

function parseOptionalFloat(field: string | undefined): number | null {
    if (field === undefined || field.trim() === '') return null;
    const value = Number(field);
    return Number.isFinite(value) ? value : null;
}

function parseRequiredInt(field: string | undefined, name: string, input: string): Result<number, ParseError> {
    const value = field === undefined || field.trim() === '' ? NaN : Number(field);
    if (!Number.isInteger(value)) {
        return err(new ParseError(input, `${name} is not an integer: "${field ?? ''}"`));
    }
    return ok(value);
}

function parseOptionalInt(field: string | undefined, name: string, input: string): Result<number | null, ParseError> {
    if (field === undefined || field.trim() === '') return ok(null);
    return parseRequiredInt(field, name, input);
}

export function parseSentence(text: string): Result<NmeaSentence, ParseError> {
    const input = text.trim();
    const match = SENTENCE_PATTERN.exec(input);
    if (!match) {
        return err(new ParseError(input, 'not an NMEA sentence'));
    }

    const [, talker, sentenceType, data, checksum] = match;
    if (checksum !== undefined) {
        const body = input.slice(1, input.lastIndexOf('*'));
        const expected = nmeaChecksum(body);
        if (parseInt(checksum, 16) !== expected) {
            return err(new ParseError(input, `checksum mismatch: expected ${expected.toString(16).toUpperCase().padStart(2, '0')}`));
        }
    }

    const fields = data.split(',');

    if (sentenceType === 'GGA') {
        // time, lat, N/S, lon, E/W, quality, satellites, hdop, ...
        const quality = parseRequiredInt(fields[5], 'fix quality', input);
        if (!quality.ok) return quality;
        const satellites = parseOptionalInt(fields[6], 'satellite count', input);
        if (!satellites.ok) return satellites;
        const gga: GgaSentence = {
            type: 'GGA',
            talker,
            fix: quality.value !== 0,
            numSatellites: satellites.value,
            horizontalDilution: parseOptionalFloat(fields[7])
        };
        return ok(gga);
    }

    if (sentenceType === 'VTG') {
        // true track, T, magnetic track, M, knots, N, kmph, K, mode
        const vtg: VtgSentence = {
            type: 'VTG',
            talker,
            kmph: parseOptionalFloat(fields[6]),
            trueTrack: parseOptionalFloat(fields[0])
        };
        return ok(vtg);
    }

    const other: OtherSentence = { type: 'OTHER', talker, sentenceType };
    return ok(other);
}
