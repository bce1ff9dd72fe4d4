import defaultProfile from '../config/site-profile.json';
import { BrowserSessionFactory, formatFormDate, lookbackStartDate } from '../src/core/browser-session.js';
import { SiteProfileSchema } from '../src/types/site-profile.js';

describe('search form dates', () => {
    test('formats dates as MM/DD/YYYY', () => {
        expect(formatFormDate(new Date(2024, 0, 5))).toBe('01/05/2024');
        expect(formatFormDate(new Date(2023, 11, 31))).toBe('12/31/2023');
    });

    test('counts the look-back window in calendar days', () => {
        expect(lookbackStartDate(new Date(2024, 2, 1, 15, 45), 730)).toBe('03/02/2022');
        expect(lookbackStartDate(new Date(2024, 2, 1), 1)).toBe('02/29/2024');
    });
});

describe('BrowserSessionFactory', () => {
    test('closing before any session was created launches nothing', async () => {
        const factory = new BrowserSessionFactory(
            { username: 'test-user', password: 'test-secret' },
            SiteProfileSchema.parse(defaultProfile)
        );

        await expect(factory.close()).resolves.toBeUndefined();
    });
});
