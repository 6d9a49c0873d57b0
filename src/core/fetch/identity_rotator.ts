/**
 * 🎭 IDENTITY ROTATION
 * A request identity is a user agent plus the header set a real browser of that
 * family sends with it. Mixing Chrome headers with a Firefox UA is itself a signal.
 */

export interface RequestIdentity {
    label: string;
    headers: Record<string, string>;
}

interface BrowserProfile {
    label: string;
    userAgent: string;
    family: 'chrome' | 'firefox' | 'safari';
}

const BROWSER_PROFILES: BrowserProfile[] = [
    {
        label: 'chrome-win',
        userAgent: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36',
        family: 'chrome',
    },
    {
        label: 'chrome-mac',
        userAgent: 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36',
        family: 'chrome',
    },
    {
        label: 'firefox-win',
        userAgent: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:127.0) Gecko/20100101 Firefox/127.0',
        family: 'firefox',
    },
    {
        label: 'safari-mac',
        userAgent: 'Mozilla/5.0 (Macintosh; Intel Mac OS X 14_5) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.5 Safari/605.1.15',
        family: 'safari',
    },
    {
        label: 'chrome-linux',
        userAgent: 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36',
        family: 'chrome',
    },
    {
        label: 'firefox-mac',
        userAgent: 'Mozilla/5.0 (Macintosh; Intel Mac OS X 14.5; rv:127.0) Gecko/20100101 Firefox/127.0',
        family: 'firefox',
    },
];

function headersFor(profile: BrowserProfile): Record<string, string> {
    const base: Record<string, string> = {
        'User-Agent': profile.userAgent,
        'Accept-Language': 'en-US,en;q=0.9',
    };

    switch (profile.family) {
        case 'chrome':
            return {
                ...base,
                Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
                'Sec-Fetch-Dest': 'document',
                'Sec-Fetch-Mode': 'navigate',
                'Sec-Fetch-Site': 'none',
                'Upgrade-Insecure-Requests': '1',
            };
        case 'firefox':
            return {
                ...base,
                Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
                'Accept-Language': 'en-US,en;q=0.5',
                'Upgrade-Insecure-Requests': '1',
            };
        case 'safari':
            return {
                ...base,
                Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
            };
    }
}

export class IdentityRotator {
    private cursor: number;

    constructor(startIndex = 0) {
        this.cursor = ((startIndex % BROWSER_PROFILES.length) + BROWSER_PROFILES.length) % BROWSER_PROFILES.length;
    }

    get size(): number {
        return BROWSER_PROFILES.length;
    }

    /** Current identity, without advancing. */
    current(): RequestIdentity {
        const profile = BROWSER_PROFILES[this.cursor];
        return { label: profile.label, headers: headersFor(profile) };
    }

    /** Advance to the next identity and return it. */
    rotate(): RequestIdentity {
        this.cursor = (this.cursor + 1) % BROWSER_PROFILES.length;
        return this.current();
    }
}
