/**
 * 🛡️ BLOCK CLASSIFIER
 * Turns an HTTP status + body (or a transport error) into a block signature.
 * Every fetch attempt goes through here, so a challenge page served with a 200
 * is never mistaken for a result page.
 */

/** Enumeration of responses a directory can answer with. */
export enum BlockType {
    CAPTCHA = 'CAPTCHA',
    WAF_403 = 'WAF_403',
    RATE_LIMIT_429 = 'RATE_LIMIT_429',
    CHALLENGE_PAGE = 'CHALLENGE_PAGE',
    SERVER_ERROR = 'SERVER_ERROR',
    TIMEOUT = 'TIMEOUT',
    CONNECTION_REFUSED = 'CONNECTION_REFUSED',
    NONE = 'NONE',
}

export type AttemptClass = 'success' | 'soft_block' | 'network_failure';

/** Structured signature of a classified response. */
export interface BlockSignature {
    type: BlockType;
    domain: string;
    raw_signal?: string;
}

// Vendor names only count behind a 403: result pages load reCAPTCHA for contact forms.
const CAPTCHA_VENDOR_INDICATORS = ['captcha', 'recaptcha', 'hcaptcha', 'turnstile'];

// Wording and markup of an actual challenge page, blocking even on a 200.
const CAPTCHA_CHALLENGE_INDICATORS = [
    'unusual traffic',
    'verify you are human',
    'are you a robot',
    'complete the captcha',
    'solve the captcha',
    'cf-challenge',
    'challenge-form',
];

const CHALLENGE_INDICATORS = [
    'access denied',
    'checking your browser',
    'just a moment',
    'attention required',
    'bot detection',
    'automated access',
    'request blocked',
];

export class BlockClassifier {
    /**
     * Classify a response by status code first, then by body content.
     *
     * @param statusCode - HTTP status code (0 for connection errors)
     */
    static classify(statusCode: number, body: string, url: string): BlockSignature {
        const domain = BlockClassifier.extractDomain(url);
        const lowerBody = body.toLowerCase();

        if (statusCode === 429) {
            return { type: BlockType.RATE_LIMIT_429, domain, raw_signal: '429' };
        }

        if (statusCode === 403) {
            if (BlockClassifier.hasCaptchaVendor(lowerBody) || BlockClassifier.hasCaptchaChallenge(lowerBody)) {
                return { type: BlockType.CAPTCHA, domain, raw_signal: '403+captcha_signals' };
            }
            return { type: BlockType.WAF_403, domain, raw_signal: '403' };
        }

        if (statusCode === 0) {
            return { type: BlockType.CONNECTION_REFUSED, domain, raw_signal: 'connection_error' };
        }

        if (statusCode >= 500) {
            return { type: BlockType.SERVER_ERROR, domain, raw_signal: String(statusCode) };
        }

        // 200s that are actually blocks
        if (BlockClassifier.hasCaptchaChallenge(lowerBody)) {
            return { type: BlockType.CAPTCHA, domain, raw_signal: 'captcha_in_body' };
        }

        if (BlockClassifier.hasChallengeSignals(lowerBody)) {
            return { type: BlockType.CHALLENGE_PAGE, domain, raw_signal: 'challenge_page' };
        }

        return { type: BlockType.NONE, domain };
    }

    /**
     * Classify a transport error (timeouts, DNS, refused connections).
     */
    static classifyError(error: Error, url: string): BlockSignature {
        const domain = BlockClassifier.extractDomain(url);
        const message = error.message.toLowerCase();
        const raw_signal = error.message.slice(0, 200);

        if (message.includes('timeout') || message.includes('timed out') || message.includes('aborted')) {
            return { type: BlockType.TIMEOUT, domain, raw_signal };
        }
        return { type: BlockType.CONNECTION_REFUSED, domain, raw_signal };
    }

    static toAttemptClass(type: BlockType): AttemptClass {
        switch (type) {
            case BlockType.NONE:
                return 'success';
            case BlockType.SERVER_ERROR:
            case BlockType.TIMEOUT:
            case BlockType.CONNECTION_REFUSED:
                return 'network_failure';
            default:
                return 'soft_block';
        }
    }

    // =========================================================================
    // PRIVATE HELPERS
    // =========================================================================

    private static extractDomain(url: string): string {
        try {
            return new URL(url).hostname.replace(/^www\./, '').toLowerCase();
        } catch {
            return 'unknown';
        }
    }

    private static hasCaptchaVendor(lowerBody: string): boolean {
        return CAPTCHA_VENDOR_INDICATORS.some((indicator) => lowerBody.includes(indicator));
    }

    private static hasCaptchaChallenge(lowerBody: string): boolean {
        return CAPTCHA_CHALLENGE_INDICATORS.some((indicator) => lowerBody.includes(indicator));
    }

    private static hasChallengeSignals(lowerBody: string): boolean {
        return CHALLENGE_INDICATORS.some((indicator) => lowerBody.includes(indicator));
    }
}
