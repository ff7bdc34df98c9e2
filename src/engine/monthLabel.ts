// src/engine/monthLabel.ts

import { MissingParameterError } from '../errors';

const MONTH_PATTERN = /^\d{4}-(0[1-9]|1[0-2])$/;

export interface MonthLabel {
    label: string;       // YYYY-MM
    monthDate: string;   // YYYY-MM-01 storage key
}

/**
 * Validate a YYYY-MM label and derive its storage key
 *
 * Surrounding whitespace is ignored. Throws MissingParameterError for an
 * absent, empty or malformed label.
 */
export function parseMonthLabel(month: unknown): MonthLabel {
    if (typeof month !== 'string' || month.trim() === '') {
        throw new MissingParameterError(['month']);
    }

    const label = month.trim();
    if (!MONTH_PATTERN.test(label)) {
        throw new MissingParameterError(['month'], `month must look like YYYY-MM, got "${label}"`);
    }

    return { label, monthDate: `${label}-01` };
}
