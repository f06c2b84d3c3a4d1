// src/jest.global-setup.ts

// Pin a zone with daylight saving so date handling is exercised away from UTC.
export default function globalSetup(): void {
    process.env.TZ = 'America/New_York';
}
