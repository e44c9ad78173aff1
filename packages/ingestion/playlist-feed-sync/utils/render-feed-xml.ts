import * as xml2js from 'xml2js';
import { log } from '@playlist-podcaster/logging';
import { IncompleteEpisodeError } from '@playlist-podcaster/errors';
import {
  FEED_GENERATOR,
  ITUNES_CATEGORY,
  ITUNES_NAMESPACE_URL
} from '@playlist-podcaster/constants';
import type { Channel, Episode, RenderFeedOptions } from '@playlist-podcaster/types';
import { buildEnclosureUrl } from './enclosure-url.js';
import { formatDuration } from './format-duration.js';
import { formatPubDate } from './parse-pub-date.js';

type XmlNode = Record<string, unknown>;

export const DEFAULT_RENDER_OPTIONS: RenderFeedOptions = {
  pretty: true,
  incompleteEpisodePolicy: 'retain',
};

// Characters XML 1.0 cannot carry: C0 controls other than tab, newline and carriage return,
// the noncharacters U+FFFE and U+FFFF, and unpaired surrogate halves
const INVALID_XML_CHARS =
  /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F\uFFFE\uFFFF]|[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g; // eslint-disable-line no-control-regex

function stripControlChars(s: string): string {
  return s.replace(INVALID_XML_CHARS, '');
}

/**
 * Decide how an episode's enclosure length is written, or whether the item is written at all.
 * Returns undefined when the episode should be left out of the document.
 */
function resolveEnclosureLength(episode: Episode, options: RenderFeedOptions): string | undefined {
  if (episode.enclosure.length !== undefined) {
    return episode.enclosure.length.toString();
  }

  switch (options.incompleteEpisodePolicy) {
    case 'fail':
      throw new IncompleteEpisodeError(episode.id);
    case 'skip':
      log.warn(`Leaving episode ${episode.id} out of the feed until its media is downloaded`);
      return undefined;
    case 'retain':
      // length="0" keeps the episode (and its publish date) in the stored feed; it is read back as unresolved
      return '0';
  }
}

function buildItem(channel: Channel, episode: Episode, enclosureLength: string): XmlNode {
  const item: XmlNode = {
    title: stripControlChars(episode.title),
  };
  if (episode.link) item.link = episode.link;
  item.description = stripControlChars(episode.description);
  item.guid = { _: episode.id, $: { isPermaLink: 'false' } };
  item.pubDate = formatPubDate(episode.publishedAt);
  item.enclosure = {
    $: {
      url: buildEnclosureUrl(channel.baseUrl, episode.enclosure.mediaPath),
      length: enclosureLength,
      type: episode.enclosure.type,
    },
  };
  item['itunes:author'] = stripControlChars(channel.title);
  item['itunes:subtitle'] = stripControlChars(episode.title);
  item['itunes:summary'] = stripControlChars(episode.description);
  if (episode.thumbnailUrl) item['itunes:image'] = { $: { href: episode.thumbnailUrl } };
  item['itunes:duration'] = formatDuration(episode.durationInSeconds);
  item['itunes:explicit'] = 'false';
  return item;
}

/**
 * Render a channel as an RSS 2.0 podcast feed.
 * The output depends only on the channel and the options: same state, same bytes.
 */
export function renderFeedXml(channel: Channel, options: RenderFeedOptions = DEFAULT_RENDER_OPTIONS): string {
  const items: XmlNode[] = [];
  for (const episode of channel.episodes) {
    const enclosureLength = resolveEnclosureLength(episode, options);
    if (enclosureLength === undefined) continue;
    items.push(buildItem(channel, episode, enclosureLength));
  }

  const title = stripControlChars(channel.title);
  const description = stripControlChars(channel.description);

  const builder = new xml2js.Builder({
    xmldec: { version: '1.0', encoding: 'UTF-8' },
    renderOpts: options.pretty
      ? { pretty: true, indent: '  ', newline: '\n' }
      : { pretty: false },
  });

  return builder.buildObject({
    rss: {
      $: { version: '2.0', 'xmlns:itunes': ITUNES_NAMESPACE_URL },
      channel: {
        title,
        link: channel.link,
        description,
        generator: FEED_GENERATOR,
        'itunes:author': title,
        'itunes:subtitle': title,
        'itunes:summary': description,
        'itunes:explicit': 'false',
        'itunes:category': { $: { text: ITUNES_CATEGORY } },
        'itunes:block': 'Yes',
        item: items,
      },
    },
  });
}
