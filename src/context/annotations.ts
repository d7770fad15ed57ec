import { NOT_SPECIFIED } from '../diagnostics/format.js'

export interface HypothesisNote {
    text: string
    engineer: string
}

export interface TextAnnotations {
    components: string[]
    hypotheses: HypothesisNote[]
}

/** Pulls structured facts out of a step's free text. */
export interface TextAnnotator {
    extract(text: string): TextAnnotations
}

export interface MarkerSet {
    component: string[]
    engineer: string[]
    hypothesis: string[]
    /** Marker values that stand for "no value", such as the step formatter's filler. */
    placeholders?: string[]
}

export const DEFAULT_MARKERS: MarkerSet = {
    component: ['Component:', 'Componente:'],
    engineer: ['Engineer:', 'Ingeniero:'],
    hypothesis: ['hypothesis', 'hipótesis'],
    placeholders: [NOT_SPECIFIED],
}

export const UNKNOWN = 'Unknown'

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function markerPattern(markers: string[]): RegExp {
    return new RegExp(markers.map(escapeRegExp).join('|'), 'i')
}

/**
 * Value written after the first occurrence of a marker: the rest of that line, trimmed,
 * with surrounding markdown emphasis removed. `null` when the marker is absent or the
 * value is empty.
 */
export function valueAfterMarker(text: string, pattern: RegExp): string | null {
    const match = pattern.exec(text)
    if (!match) return null
    const rest = text.slice(match.index + match[0].length)
    const line = rest.split(/\r?\n/, 1)[0] ?? ''
    const value = line.trim().replace(/^[*_\s]+|[*_\s]+$/g, '')
    return value.length > 0 ? value : null
}

/** Line-marker heuristics: `Component: x`, `Engineer: y`, and a hypothesis keyword anywhere. */
export class MarkerAnnotator implements TextAnnotator {
    private component: RegExp
    private engineer: RegExp
    private hypothesis: RegExp
    private placeholders: Set<string>

    constructor(markers: MarkerSet = DEFAULT_MARKERS) {
        this.component = markerPattern(markers.component)
        this.engineer = markerPattern(markers.engineer)
        this.hypothesis = markerPattern(markers.hypothesis)
        this.placeholders = new Set((markers.placeholders ?? []).map((p) => p.toLowerCase()))
    }

    extract(text: string): TextAnnotations {
        const component = this.value(text, this.component)
        const hypotheses: HypothesisNote[] = []
        if (this.hypothesis.test(text)) {
            hypotheses.push({ text, engineer: this.value(text, this.engineer) ?? UNKNOWN })
        }
        return { components: component ? [component] : [], hypotheses }
    }

    private value(text: string, pattern: RegExp): string | null {
        const value = valueAfterMarker(text, pattern)
        return value && !this.placeholders.has(value.toLowerCase()) ? value : null
    }
}
