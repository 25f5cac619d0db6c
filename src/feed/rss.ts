/**
 * Minimal RSS 2.0 serializer for a single channel.
 */

export interface RssChannel {
  title: string;
  link: string;
  description: string;
  language: string;
  generator?: string;
}

export interface RssEnclosure {
  url: string;
  type: string;
  length: number;
}

export interface RssEntry {
  title: string;
  link: string;
  description: string;
  pubDate: Date;
  enclosure?: RssEnclosure;
}

export function escapeXml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function cdata(s: string): string {
  return `<![CDATA[${s.replace(/\]\]>/g, ']]]]><![CDATA[>')}]]>`;
}

function buildItem(entry: RssEntry): string {
  let buf = '    <item>\n';
  buf += `      <title>${escapeXml(entry.title)}</title>\n`;
  buf += `      <link>${escapeXml(entry.link)}</link>\n`;
  if (entry.description) {
    const desc = /[<>]/.test(entry.description) ? cdata(entry.description) : escapeXml(entry.description);
    buf += `      <description>${desc}</description>\n`;
  }
  buf += `      <guid isPermaLink="true">${escapeXml(entry.link)}</guid>\n`;
  if (entry.enclosure) {
    const { url, length, type } = entry.enclosure;
    buf += `      <enclosure url="${escapeXml(url)}" length="${length}" type="${escapeXml(type)}"/>\n`;
  }
  buf += `      <pubDate>${entry.pubDate.toUTCString()}</pubDate>\n`;
  buf += '    </item>\n';
  return buf;
}

export function buildRssXml(channel: RssChannel, entries: RssEntry[], buildDate: Date = new Date()): string {
  const generator = channel.generator
    ? `    <generator>${escapeXml(channel.generator)}</generator>\n`
    : '';
  const items = entries.map(buildItem).join('');
  return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>${escapeXml(channel.title)}</title>
    <link>${escapeXml(channel.link)}</link>
    <description>${escapeXml(channel.description)}</description>
    <language>${escapeXml(channel.language)}</language>
    <lastBuildDate>${buildDate.toUTCString()}</lastBuildDate>
${generator}${items}  </channel>
</rss>
`;
}
