/**
 * @fileoverview Activity type classification from free-text names
 * @module core/TypeClassifier
 *
 * Derives the semantic activity type from names such as
 * "CWA_ASU-1A00_-_Install_Piping_Insulation" or "CWA_ASU-1A02_-_Set_101-V135".
 *
 * Runs of underscores and whitespace are separators. When a name does not
 * classify that way, hyphens around Install/Set are read as separators too
 * ("CWA_ASU-1A00-Install-Piping" reads as Piping). Elsewhere a hyphen ends
 * the type ("Install_Concrete-Slab" is Concrete).
 *
 * Rules (first match wins):
 * 1. _Install_<Type>  → <Type> with underscores as spaces
 * 2. Civil_Works token → "Civil Works"
 * 3. _Set_<anything>  → "Equipment"
 * 4. otherwise        → "" (unknown, never an error)
 */

import { CIVIL_WORKS_TYPE, EQUIPMENT_TYPE } from './Constants';

const SEPARATOR_RUN = /[_\s]+/g;
const HYPHENATED_KEYWORD = /[-_]+(install|set)[-_]+/gi;
const INSTALL_PATTERN = /_Install_([A-Za-z0-9_]+)/i;
const SET_PATTERN = /_Set_([A-Za-z0-9_]+)/i;
const CIVIL_WORKS_PATTERN = /(^|_)civil_works($|_)/i;
const CWA_PATTERN = /\bCWA\b\s*ASU\s*-\s*([A-Za-z0-9]+)/i;
const ASU_PATTERN = /\bASU\s*-\s*([A-Za-z0-9]+)/i;

/**
 * TypeClassifier class providing static methods for name parsing
 */
export class TypeClassifier {

    /**
     * Classify an activity name
     *
     * @param name - Activity name
     * @returns Type string, '' when unrecognised
     *
     * @example
     * TypeClassifier.classify('CWA_ASU-1A00_-_Install_Piping_Insulation'); // 'Piping Insulation'
     * TypeClassifier.classify('CWA_ASU-1A02_-_Set_101-V135');               // 'Equipment'
     */
    static classify(name: string | null | undefined): string {
        if (!name) return '';
        const normalized = TypeClassifier.normalize(name);
        return TypeClassifier.classifyNormalized(normalized)
            || TypeClassifier.classifyNormalized(TypeClassifier.unhyphenate(normalized));
    }

    /**
     * Check whether a name describes an equipment setting activity
     */
    static isSetActivity(name: string | null | undefined): boolean {
        if (!name) return false;
        const normalized = TypeClassifier.normalize(name);
        return SET_PATTERN.test(normalized) || SET_PATTERN.test(TypeClassifier.unhyphenate(normalized));
    }

    /**
     * Extract the CWA code from a layer or element name
     *
     * Accepts "CWA ASU - 1A01 - ...", "CWA_ASU-1A01_..." or a bare "ASU-1A01".
     *
     * @returns The code after "ASU-", or null
     */
    static extractCwa(text: string | null | undefined): string | null {
        if (!text) return null;
        const spaced = text.replace(SEPARATOR_RUN, ' ');
        const match = CWA_PATTERN.exec(spaced) ?? ASU_PATTERN.exec(spaced);
        return match ? match[1] : null;
    }

    private static classifyNormalized(normalized: string): string {
        const install = INSTALL_PATTERN.exec(normalized);
        if (install) {
            return TypeClassifier.stripSuffixTokens(install[1]);
        }

        if (CIVIL_WORKS_PATTERN.test(normalized)) {
            return CIVIL_WORKS_TYPE;
        }

        if (SET_PATTERN.test(normalized)) {
            return EQUIPMENT_TYPE;
        }

        return '';
    }

    /**
     * Collapse runs of underscores and whitespace into a single underscore
     */
    private static normalize(name: string): string {
        return name.trim().replace(SEPARATOR_RUN, '_');
    }

    /**
     * "ASU-1A00-Install-Piping" → "ASU-1A00_Install_Piping"
     */
    private static unhyphenate(normalized: string): string {
        return normalized.replace(HYPHENATED_KEYWORD, '_$1_');
    }

    /**
     * Turn "Piping_Insulation_L2" into "Piping Insulation".
     * Trailing tokens carrying digits are suffixes (levels, tags), not type words.
     * The first token is always kept.
     */
    private static stripSuffixTokens(raw: string): string {
        const tokens = raw.split('_').filter(token => token.length > 0);
        while (tokens.length > 1 && /\d/.test(tokens[tokens.length - 1])) {
            tokens.pop();
        }
        return tokens.join(' ').trim();
    }
}
