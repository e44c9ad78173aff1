import * as path from 'path';
import * as xml2js from 'xml2js';
import fs from 'fs-extra';
import { log } from '@playlist-podcaster/logging';
import { MalformedFeedError } from '@playlist-podcaster/errors';
import { ENCLOSURE_MIME_TYPE, TEMP_FEED_SUFFIX } from '@playlist-podcaster/constants';
import type { Channel, Episode, FeedDestination, RenderFeedOptions } from '@playlist-podcaster/types';
import { mediaPathFromEnclosureUrl } from './enclosure-url.js';
import { parseDuration } from './format-duration.js';
import { parsePubDate } from './parse-pub-date.js';
import { renderFeedXml, DEFAULT_RENDER_OPTIONS } from './render-feed-xml.js';

export interface LoadedChannel {
  channel: Channel;
  existed: boolean;
}

export interface TextSink {
  write(chunk: string): boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// explicitArray: false gives a single child as a value and repeated children as an array
function toArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

// Text content, whether the element carried attributes ({ _: text }) or not
function textOf(value: unknown): string | undefined {
  const node = Array.isArray(value) ? value[0] : value;
  if (typeof node === 'string') return node;
  if (isRecord(node) && typeof node._ === 'string') return node._;
  return undefined;
}

export function createEmptyChannel(baseUrl: string): Channel {
  return {
    title: '',
    link: '',
    description: '',
    baseUrl,
    episodes: [],
  };
}

// Parse RSS XML to JSON
async function parseFeedXml(feedPath: string, xmlContent: string): Promise<unknown> {
  const parser = new xml2js.Parser({
    explicitArray: false,
    charkey: '_',
    mergeAttrs: true,
  });

  try {
    return await parser.parseStringPromise(xmlContent);
  } catch (error) {
    throw new MalformedFeedError(feedPath, 'not well-formed XML', { cause: error });
  }
}

function parseEnclosureLength(value: unknown): number | undefined {
  if (typeof value !== 'string' || !/^\d+$/.test(value.trim())) return undefined;
  const length = parseInt(value.trim(), 10);
  // A zero length is how an episode without downloaded media is written
  return length > 0 ? length : undefined;
}

function toEpisode(feedPath: string, rawItem: unknown, index: number, baseUrl: string): Episode {
  const itemLabel = `item #${index + 1}`;
  if (!isRecord(rawItem)) {
    throw new MalformedFeedError(feedPath, `${itemLabel} is empty`);
  }

  const id = textOf(rawItem.guid)?.trim();
  if (!id) {
    throw new MalformedFeedError(feedPath, `${itemLabel} has no guid`);
  }

  const enclosure = Array.isArray(rawItem.enclosure) ? rawItem.enclosure[0] : rawItem.enclosure;
  if (!isRecord(enclosure) || typeof enclosure.url !== 'string' || enclosure.url.trim() === '') {
    throw new MalformedFeedError(feedPath, `episode ${id} has no enclosure url`);
  }

  const pubDateString = textOf(rawItem.pubDate);
  if (!pubDateString) {
    throw new MalformedFeedError(feedPath, `episode ${id} has no pubDate`);
  }
  const publishedAt = parsePubDate(pubDateString);
  if (isNaN(publishedAt.getTime())) {
    throw new MalformedFeedError(feedPath, `episode ${id} has an invalid pubDate "${pubDateString}"`);
  }

  const mediaPath = mediaPathFromEnclosureUrl(enclosure.url.trim(), baseUrl);
  if (mediaPath === '') {
    throw new MalformedFeedError(feedPath, `episode ${id} has an enclosure url without a file name`);
  }

  const image = rawItem['itunes:image'];
  const thumbnailUrl = isRecord(image) && typeof image.href === 'string' && image.href ? image.href : undefined;

  return {
    id,
    title: textOf(rawItem.title) ?? textOf(rawItem['itunes:subtitle']) ?? id,
    description: textOf(rawItem.description) ?? textOf(rawItem['itunes:summary']) ?? '',
    link: textOf(rawItem.link) || undefined,
    thumbnailUrl,
    publishedAt,
    durationInSeconds: parseDuration(textOf(rawItem['itunes:duration'])) ?? 0,
    enclosure: {
      mediaPath,
      type: typeof enclosure.type === 'string' && enclosure.type ? enclosure.type : ENCLOSURE_MIME_TYPE,
      length: parseEnclosureLength(enclosure.length),
    },
  };
}

/**
 * Rebuild a channel from a feed document.
 * Anything that does not look like an RSS channel of episodes is a MalformedFeedError:
 * merging into state we could not read would drop episodes on the next write.
 */
export async function parseChannel(feedPath: string, xmlContent: string, baseUrl: string): Promise<Channel> {
  const parsed = await parseFeedXml(feedPath, xmlContent);

  const rss = isRecord(parsed) ? parsed.rss : undefined;
  const rawChannel = isRecord(rss) ? rss.channel : undefined;
  if (!isRecord(rawChannel)) {
    throw new MalformedFeedError(feedPath, 'missing <rss><channel> element');
  }

  const episodes: Episode[] = [];
  const seenIds = new Set<string>();
  toArray(rawChannel.item).forEach((rawItem, index) => {
    const episode = toEpisode(feedPath, rawItem, index, baseUrl);
    if (seenIds.has(episode.id)) {
      log.warn(`Feed ${feedPath} lists episode ${episode.id} more than once, keeping the first`);
      return;
    }
    seenIds.add(episode.id);
    episodes.push(episode);
  });

  return {
    title: textOf(rawChannel.title) ?? '',
    link: textOf(rawChannel.link) ?? '',
    description: textOf(rawChannel.description) ?? '',
    baseUrl,
    episodes,
  };
}

/**
 * Load the channel stored at feedPath. A missing file is a new, empty channel.
 */
export async function loadChannel(feedPath: string, options: { baseUrl: string }): Promise<LoadedChannel> {
  if (!(await fs.pathExists(feedPath))) {
    log.info(`Feed file ${feedPath} not found, starting a new feed.`);
    return { channel: createEmptyChannel(options.baseUrl), existed: false };
  }

  const xmlContent = await fs.readFile(feedPath, 'utf-8');
  const channel = await parseChannel(feedPath, xmlContent, options.baseUrl);
  log.debug(`Loaded ${channel.episodes.length} episodes from ${feedPath}`);
  return { channel, existed: true };
}

// Write next to the target first, then rename over it, so readers never see a half-written feed
export async function writeFeedFileAtomically(feedPath: string, content: string): Promise<void> {
  const tempPath = `${feedPath}${TEMP_FEED_SUFFIX}`;
  await fs.ensureDir(path.dirname(feedPath));

  try {
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.move(tempPath, feedPath, { overwrite: true });
  } catch (error) {
    log.error(`Error writing feed to ${feedPath}:`, error);
    await fs.remove(tempPath);
    throw error;
  }
}

/**
 * Render the channel and hand the document to its destination.
 * Returns the rendered document.
 */
export async function saveChannel(
  channel: Channel,
  destination: FeedDestination,
  options: RenderFeedOptions = DEFAULT_RENDER_OPTIONS,
  stdout: TextSink = process.stdout
): Promise<string> {
  const document = renderFeedXml(channel, options);

  if (destination.kind === 'file') {
    await writeFeedFileAtomically(destination.path, `${document}\n`);
    log.info(`💾 Feed with ${channel.episodes.length} episodes written to ${destination.path}`);
  } else {
    stdout.write(`${document}\n`);
  }

  return document;
}
