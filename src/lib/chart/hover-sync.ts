/**
 * Chart ↔ Event List Hover Sync
 *
 * State transitions shared by the chart and the event list:
 *   - list hover    → highlight the marker and scroll the chart to it
 *   - marker hover  → highlight the marker and bring the list item into view
 *   - list click    → scroll the chart to the marker
 *
 * Events without a marker never highlight or scroll anything.
 */

export interface ChartFocus {
    id: string;
    /** Bumped on every request so re-focusing the same event still scrolls */
    nonce: number;
}

export interface HoverState {
    highlightedId: string | null;
    focus: ChartFocus | null;
    /** List item to scroll into view; only marker hover sets it */
    listScrollId: string | null;
}

export const INITIAL_HOVER_STATE: HoverState = {
    highlightedId: null,
    focus: null,
    listScrollId: null,
};

function nextFocus(prev: ChartFocus | null, id: string): ChartFocus {
    return { id, nonce: (prev?.nonce ?? 0) + 1 };
}

export function hoverFromList(
    state: HoverState,
    id: string | null,
    markedIds: ReadonlySet<string>,
): HoverState {
    if (id === null || !markedIds.has(id)) {
        return { ...state, highlightedId: null, listScrollId: null };
    }
    return { highlightedId: id, focus: nextFocus(state.focus, id), listScrollId: null };
}

export function hoverFromChart(state: HoverState, id: string | null): HoverState {
    return { ...state, highlightedId: id, listScrollId: id };
}

export function focusEvent(
    state: HoverState,
    id: string,
    markedIds: ReadonlySet<string>,
): HoverState {
    if (!markedIds.has(id)) return state;
    return { ...state, focus: nextFocus(state.focus, id) };
}
