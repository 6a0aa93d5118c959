let debugEnabled = Boolean(process.env.DEBUG);

/**
 * Turns debug output on or off for the rest of the process.
 * The CLI switches it on with `--verbose`; the `DEBUG` environment variable switches it on at startup.
 */
export function setDebug(enabled: boolean): void {
    debugEnabled = enabled;
}

export function dbg(s: string) {
    if (debugEnabled) {
        console.debug(s);
    }
}

export function say(s: string) {
    console.log(s);
}

/**
 * Seconds elapsed since `start`, where `start` is a `performance.now()` reading.
 */
export function secondsSince(start: number, now: () => number = () => performance.now()): number {
    return Math.max(0, (now() - start) / 1000);
}
