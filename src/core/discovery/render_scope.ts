import { Logger } from '../../utils/logger';
import { toError } from '../../utils/errors';
import { RenderSession, RenderSessionFactory } from '../fetch/render_session';

/**
 * One site's render session: opened on first use, closed once by `release()`.
 */
export class RenderScope {
    private session: Promise<RenderSession> | null = null;

    constructor(private readonly factory: RenderSessionFactory, private readonly siteId: string) { }

    acquire = (): Promise<RenderSession> => {
        if (!this.session) {
            this.session = this.factory.open(this.siteId);
        }
        return this.session;
    };

    get opened(): boolean {
        return this.session !== null;
    }

    async release(): Promise<void> {
        const pending = this.session;
        this.session = null;
        if (!pending) return;

        try {
            const session = await pending;
            await session.close();
        } catch (e) {
            Logger.logError('[RenderScope] release failed', toError(e), { site_id: this.siteId });
        }
    }
}
