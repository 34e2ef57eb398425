import { createHash } from 'crypto';
import { beforeAll } from 'vitest';

// Set up test environment
beforeAll(() => {
    process.env.NODE_ENV = 'test';
    process.env.LOG_LEVEL = 'error';
});

// Global test utilities
declare global {
    var testUtils: {
        sha256: (data: string | Buffer) => string;
        buildRssFeed: (items: Array<{ title?: string; link?: string; description?: string; pubDate?: string }>) => string;
    };
}

function escapeXml(value: string): string {
    return value
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;');
}

globalThis.testUtils = {
    sha256: (data: string | Buffer) => createHash('sha256').update(data).digest('hex'),

    buildRssFeed: (items) => {
        const body = items.map(item => [
            '<item>',
            item.title !== undefined ? `<title>${escapeXml(item.title)}</title>` : '',
            item.link !== undefined ? `<link>${escapeXml(item.link)}</link>` : '',
            item.description !== undefined ? `<description>${escapeXml(item.description)}</description>` : '',
            item.pubDate !== undefined ? `<pubDate>${item.pubDate}</pubDate>` : '',
            '</item>'
        ].join('')).join('\n');

        return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0"><channel><title>Test orders</title><link>https://market.example.test/</link><description>Test feed</description>
${body}
</channel></rss>`;
    }
};
