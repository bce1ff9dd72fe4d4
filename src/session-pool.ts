import { RateLimiterMemory, RateLimiterRes } from 'rate-limiter-flexible';
import { CancelledError, errorMessage } from './errors.js';
import { logger } from './logger.js';
import { Session, SessionFactory } from './types/session.js';

export interface SessionPoolOptions {
    maxSessions: number;
    sessionsPerMinute?: number;
}

/**
 * Bounded set of exclusively owned sessions. A session is either idle or held
 * by exactly one caller; the number of live sessions never exceeds maxSessions.
 */
export class SessionPool {
    private factory: SessionFactory;
    private maxSessions: number;
    private rateLimiter: RateLimiterMemory;
    private idle: Session[] = [];
    private inUse = new Set<Session>();
    private waiters: Array<() => void> = [];
    private live = 0;
    private created = 0;

    constructor(factory: SessionFactory, options: SessionPoolOptions) {
        this.factory = factory;
        this.maxSessions = Math.max(1, options.maxSessions);
        // Every session is a fresh login against the portal, so creation is paced.
        this.rateLimiter = new RateLimiterMemory({
            points: options.sessionsPerMinute || 6,
            duration: 60
        });
    }

    get liveCount(): number {
        return this.live;
    }

    get createdCount(): number {
        return this.created;
    }

    get inUseCount(): number {
        return this.inUse.size;
    }

    public async acquire(signal?: AbortSignal): Promise<Session> {
        for (;;) {
            if (signal?.aborted) {
                throw new CancelledError();
            }

            const idle = this.idle.pop();
            if (idle) {
                this.inUse.add(idle);
                return idle;
            }

            if (this.live < this.maxSessions) {
                this.live++;
                try {
                    await this.throttle(signal);
                    const session = await this.factory.create();
                    this.created++;
                    this.inUse.add(session);
                    logger.debug(`Session ${session.id} created (${this.live}/${this.maxSessions} live)`, 'pool');
                    return session;
                } catch (error) {
                    this.live--;
                    this.wake();
                    throw error;
                }
            }

            await this.waitForSlot(signal);
        }
    }

    public release(session: Session): void {
        if (!this.inUse.delete(session)) {
            return;
        }
        this.idle.push(session);
        this.wake();
    }

    public async discard(session: Session): Promise<void> {
        this.inUse.delete(session);
        try {
            await session.close();
        } catch (error) {
            logger.warn(`Closing session ${session.id} failed: ${errorMessage(error)}`, 'pool');
        } finally {
            this.live--;
            this.wake();
        }
    }

    /** Closes every idle session. Sessions still held are left to their owners. */
    public async drain(): Promise<void> {
        const sessions = this.idle.splice(0);
        await Promise.all(sessions.map(session => this.discard(session)));
    }

    private async throttle(signal?: AbortSignal): Promise<void> {
        for (;;) {
            try {
                await this.rateLimiter.consume('session', 1);
            } catch (rejection) {
                if (!(rejection instanceof RateLimiterRes)) {
                    throw rejection;
                }
                logger.debug(`Session creation paced, waiting ${rejection.msBeforeNext}ms`, 'pool');
                await new Promise(resolve => setTimeout(resolve, rejection.msBeforeNext));
                if (signal?.aborted) {
                    throw new CancelledError();
                }
                continue;
            }
            if (signal?.aborted) {
                throw new CancelledError();
            }
            return;
        }
    }

    private waitForSlot(signal?: AbortSignal): Promise<void> {
        return new Promise<void>(resolve => {
            const waiter = () => {
                signal?.removeEventListener('abort', waiter);
                this.waiters = this.waiters.filter(entry => entry !== waiter);
                resolve();
            };
            this.waiters.push(waiter);
            signal?.addEventListener('abort', waiter, { once: true });
        });
    }

    private wake(): void {
        const waiter = this.waiters.shift();
        if (waiter) {
            waiter();
        }
    }
}
