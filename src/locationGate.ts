import { fileURLToPath } from 'url';
import z from 'zod';
import { UnknownTargetAreaError } from './errors.js';
import { readJSON } from './helpers.js';
import type { LocationVerdict } from './types.js';

const TargetAreaSchema = z.object({
    name: z.string().min(1),
    state: z.string().length(2).transform(s => s.toUpperCase()),
    places: z.array(z.string().min(1).transform(s => s.toLowerCase())).min(1)
});

export const LocationRulesSchema = z.object({
    metros: z.array(TargetAreaSchema).min(1),
    remoteIndicators: z.array(z.string().min(1)),
    nationwideTerms: z.array(z.string().min(1)),
    states: z.record(z.string().length(2), z.string().min(1)),
    outOfAreaPlaces: z.array(z.string().min(1))
});

export type LocationRules = z.infer<typeof LocationRulesSchema>;
export type TargetArea = z.infer<typeof TargetAreaSchema>;

export const DEFAULT_LOCATION_RULES_PATH = fileURLToPath(new URL('../data/locationRules.json', import.meta.url));

export function loadLocationRules(p = DEFAULT_LOCATION_RULES_PATH): LocationRules {
    return LocationRulesSchema.parse(readJSON<unknown>(p));
}

function stateCode(rules: LocationRules, part: string): string | undefined {
    const upper = part.trim().toUpperCase();
    if (upper in rules.states) return upper;
    const lower = part.trim().toLowerCase();
    return Object.keys(rules.states).find(code => rules.states[code].toLowerCase() === lower);
}

/**
 * The target area a "City, State[, Country]" search location stands for: the known metro that lists the city,
 * or an area made of the city alone.
 *
 * @throws {@link UnknownTargetAreaError} when no city or no known state is named.
 */
export function resolveTargetArea(rules: LocationRules, location: string): TargetArea {
    const [first = '', ...rest] = location.split(',');
    const city = first.toLowerCase().replace(/\s+/g, ' ').trim();
    const state = rest.map(part => stateCode(rules, part)).find(code => code !== undefined);
    if (!city || !state) throw new UnknownTargetAreaError(location);
    const metro = rules.metros.find(m => m.state === state && (m.places.includes(city) || m.name.split(',')[0].toLowerCase() === city));
    if (metro) return metro;
    return { name: `${first.replace(/\s+/g, ' ').trim()}, ${state}`, state, places: [city] };
}

const escapeRegExp = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

function phraseMatcher(phrases: string[]): (text: string) => string[] {
    const compiled = phrases.map(p => {
        const phrase = p.toLowerCase().trim();
        return { phrase, re: new RegExp(`(^|[^a-z0-9])${escapeRegExp(phrase)}(?=$|[^a-z0-9])`) };
    });
    return text => compiled.filter(({ re }) => re.test(text)).map(({ phrase }) => phrase);
}

/**
 * Rule-based location filter. It only rejects a location that clearly names somewhere outside the target area;
 * blank, remote-like, nation-wide and unrecognised strings all pass on to the model.
 */
export class LocationGate {
    private rules: LocationRules;
    private target: TargetArea;
    private inArea: (text: string) => string[];
    private remote: (text: string) => string[];
    private nationwide: (text: string) => string[];
    private outOfArea: (text: string) => string[];
    // places of the other known metros, each only out of area when no state or that metro's state is named
    private otherMetros: Array<{ state: string; places: (text: string) => string[] }>;
    private stateNames: (text: string) => string[];
    private stateByName: Map<string, string>;

    constructor(rules: LocationRules, targetLocation: string) {
        this.rules = rules;
        this.target = resolveTargetArea(rules, targetLocation);
        const notTarget = (place: string) => !this.target.places.includes(place.toLowerCase());
        this.inArea = phraseMatcher(this.target.places);
        this.remote = phraseMatcher(rules.remoteIndicators);
        this.nationwide = phraseMatcher(rules.nationwideTerms);
        this.outOfArea = phraseMatcher(rules.outOfAreaPlaces.filter(notTarget));
        this.otherMetros = rules.metros
            .filter(m => m.name !== this.target.name)
            .map(m => ({ state: m.state, places: phraseMatcher(m.places.filter(notTarget)) }));
        this.stateNames = phraseMatcher(Object.values(rules.states));
        this.stateByName = new Map(Object.entries(rules.states).map(([code, name]) => [name.toLowerCase(), code.toUpperCase()]));
    }

    get targetArea() {
        return this.target.name;
    }

    /**
     * State codes named in the text. Codes only count in upper case, after a comma or at the end,
     * so words like "in" or "or" and shouted phrases like "(IN OFFICE)" are not read as states.
     */
    private statesIn(raw: string, lower: string): Set<string> {
        const found = new Set<string>();
        for (const [, afterComma, atEnd] of raw.matchAll(/,\s*([A-Z]{2})(?![A-Za-z])|(?<![A-Za-z])([A-Z]{2})\s*$/g)) {
            const code = afterComma ?? atEnd;
            if (code in this.rules.states) found.add(code);
        }
        for (const name of this.stateNames(lower)) {
            const code = this.stateByName.get(name);
            if (code) found.add(code);
        }
        return found;
    }

    check(location: string | null | undefined): LocationVerdict {
        const raw = (location ?? '').trim();
        if (!raw) return { decision: 'pass', reason: 'blank', places: [] };
        const lower = raw.toLowerCase().replace(/\s+/g, ' ');

        const remote = this.remote(lower);
        if (remote.length) return { decision: 'pass', reason: 'remote', places: remote };

        const inArea = this.inArea(lower);
        const states = this.statesIn(raw, lower);
        const target = this.target.state;
        if (inArea.length && (states.size === 0 || states.has(target))) {
            return { decision: 'pass', reason: 'in_area', places: inArea };
        }

        const otherStates = [...states].filter(s => s !== target);
        if (otherStates.length) return { decision: 'reject', reason: 'out_of_area_state', places: [...inArea, ...otherStates] };

        const outOfArea = [
            ...this.outOfArea(lower),
            ...this.otherMetros.filter(m => states.size === 0 || states.has(m.state)).flatMap(m => m.places(lower))
        ];
        if (outOfArea.length) return { decision: 'reject', reason: 'out_of_area_place', places: outOfArea };

        return { decision: 'pass', reason: this.nationwide(lower).length ? 'nationwide' : 'ambiguous', places: [...states] };
    }
}
