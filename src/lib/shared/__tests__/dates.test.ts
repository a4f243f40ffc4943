import { normalizeDayString, todayIso } from '../dates';

describe('todayIso', () => {
    it('formats the local calendar day', () => {
        expect(todayIso(new Date(2024, 0, 5, 23, 59))).toBe('2024-01-05');
        expect(todayIso(new Date(2024, 10, 25, 0, 1))).toBe('2024-11-25');
    });
});

describe('normalizeDayString', () => {
    it('pads slash and dash dates', () => {
        expect(normalizeDayString('2024/1/5')).toBe('2024-01-05');
        expect(normalizeDayString(' 2024-12-31 ')).toBe('2024-12-31');
    });

    it('rejects other shapes', () => {
        expect(normalizeDayString('2024.01.05')).toBeNull();
        expect(normalizeDayString('Jan 5 2024')).toBeNull();
    });
});
