/**
 * Hover Sync Tests
 */

import { focusEvent, hoverFromChart, hoverFromList, INITIAL_HOVER_STATE } from '../hover-sync';

const MARKED = new Set(['7', '8']);

describe('Hover Sync', () => {
    describe('hoverFromList', () => {
        it('highlights the marker and scrolls the chart to it', () => {
            const state = hoverFromList(INITIAL_HOVER_STATE, '7', MARKED);

            expect(state).toEqual({
                highlightedId: '7',
                focus: { id: '7', nonce: 1 },
                listScrollId: null,
            });
        });

        it('bumps the focus nonce when the same event is hovered again', () => {
            const first = hoverFromList(INITIAL_HOVER_STATE, '7', MARKED);
            const left = hoverFromList(first, null, MARKED);
            const again = hoverFromList(left, '7', MARKED);

            expect(left.highlightedId).toBeNull();
            expect(left.focus).toEqual({ id: '7', nonce: 1 });
            expect(again.focus).toEqual({ id: '7', nonce: 2 });
        });

        it('ignores events that have no marker', () => {
            const state = hoverFromList(INITIAL_HOVER_STATE, '99', MARKED);

            expect(state).toEqual(INITIAL_HOVER_STATE);
        });
    });

    describe('hoverFromChart', () => {
        it('highlights and asks the list to scroll without moving the chart', () => {
            const state = hoverFromChart(INITIAL_HOVER_STATE, '8');

            expect(state).toEqual({ highlightedId: '8', focus: null, listScrollId: '8' });
        });

        it('clears both on leaving the marker', () => {
            const state = hoverFromChart(hoverFromChart(INITIAL_HOVER_STATE, '8'), null);

            expect(state.highlightedId).toBeNull();
            expect(state.listScrollId).toBeNull();
        });
    });

    describe('focusEvent', () => {
        it('scrolls the chart to a marked event', () => {
            const state = focusEvent(INITIAL_HOVER_STATE, '8', MARKED);

            expect(state.focus).toEqual({ id: '8', nonce: 1 });
            expect(state.highlightedId).toBeNull();
        });

        it('leaves state untouched for an unmarked event', () => {
            expect(focusEvent(INITIAL_HOVER_STATE, '99', MARKED)).toBe(INITIAL_HOVER_STATE);
        });
    });
});
