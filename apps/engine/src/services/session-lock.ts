import { v7 as uuid } from 'uuid';

const TAG = '[lock]';

/**
 * In-process single-flight lock per session key. Acquire is set-if-absent,
 * release is compare-and-delete on the owner token, so a stale holder can
 * never release someone else's lock.
 */
export class SessionLock {
    private readonly holders = new Map<string, string>();

    tryAcquire(key: string): string | null {
        if (this.holders.has(key)) return null;
        const token = uuid();
        this.holders.set(key, token);
        return token;
    }

    release(key: string, token: string): boolean {
        if (this.holders.get(key) !== token) {
            console.warn(`${TAG} release of ${key} ignored: not the holder`);
            return false;
        }
        this.holders.delete(key);
        return true;
    }

    isHeld(key: string): boolean {
        return this.holders.has(key);
    }
}
