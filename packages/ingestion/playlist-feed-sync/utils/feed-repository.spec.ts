import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { MalformedFeedError } from '@playlist-podcaster/errors';
import type { Channel } from '@playlist-podcaster/types';
import { loadChannel, parseChannel, saveChannel, createEmptyChannel } from './feed-repository.js';

vi.mock('@playlist-podcaster/logging', () => ({
  log: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  }
}));

const BASE_URL = 'https://cdn.example.com/feeds';

function makeChannel(): Channel {
  return {
    title: 'Weekend Projects',
    link: 'https://videos.example.com/playlist?list=PL-test',
    description: 'Podcast feed for Weekend Projects',
    baseUrl: BASE_URL,
    episodes: [
      {
        id: 'v2',
        title: 'Painting the shed',
        description: 'Two coats & a trim',
        link: 'https://videos.example.com/watch?v=v2',
        thumbnailUrl: 'https://img.example.com/v2.jpg',
        publishedAt: new Date('2026-10-11T08:00:00.000Z'),
        durationInSeconds: 300,
        enclosure: { mediaPath: 'v2.mp4', type: 'video/mp4', length: 2048 }
      },
      {
        id: 'v1',
        title: 'Building a shed',
        description: '',
        publishedAt: new Date('2026-10-04T08:00:00.000Z'),
        durationInSeconds: 3725,
        enclosure: { mediaPath: 'v1.mp4', type: 'video/mp4' }
      }
    ]
  };
}

function feedXml(items: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:itunes="http://www.itunes.com/dtds/podcast-1.0.dtd">
  <channel>
    <title>Legacy Feed</title>
    <link>https://videos.example.com/playlist?list=PL-old</link>
    <description>Hand written</description>
${items}
  </channel>
</rss>`;
}

describe('feed repository', () => {
  let tempDir: string;
  let feedPath: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'feed-repository-'));
    feedPath = path.join(tempDir, 'weekend-projects.rss');
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  describe('loadChannel', () => {
    it('should return an empty channel when the feed file does not exist', async () => {
      const loaded = await loadChannel(feedPath, { baseUrl: BASE_URL });

      expect(loaded.existed).toBe(false);
      expect(loaded.channel).toEqual(createEmptyChannel(BASE_URL));
    });

    it('should read back exactly what saveChannel wrote', async () => {
      const channel = makeChannel();
      await saveChannel(channel, { kind: 'file', path: feedPath });

      const loaded = await loadChannel(feedPath, { baseUrl: BASE_URL });

      expect(loaded.existed).toBe(true);
      expect(loaded.channel).toEqual(channel);
    });

    it('should read terse documents too', async () => {
      const channel = makeChannel();
      await saveChannel(channel, { kind: 'file', path: feedPath }, { pretty: false, incompleteEpisodePolicy: 'retain' });

      const loaded = await loadChannel(feedPath, { baseUrl: BASE_URL });

      expect(loaded.channel).toEqual(channel);
    });

    it('should fail with MalformedFeedError on an empty file', async () => {
      await fs.writeFile(feedPath, '');

      await expect(loadChannel(feedPath, { baseUrl: BASE_URL })).rejects.toBeInstanceOf(MalformedFeedError);
    });
  });

  describe('parseChannel', () => {
    it('should recover a single-item feed written by another tool', async () => {
      const channel = await parseChannel(feedPath, feedXml(`
    <item>
      <title>Old episode</title>
      <guid>old-1</guid>
      <pubDate>Thu, 25 Jul 2024 14:54:00 GMT</pubDate>
      <enclosure url="http://localhost/old-1.mp4" length="12345" type="video/mp4"/>
      <itunes:summary>From the summary</itunes:summary>
      <itunes:duration>11:46</itunes:duration>
    </item>`), BASE_URL);

      expect(channel.title).toBe('Legacy Feed');
      expect(channel.link).toBe('https://videos.example.com/playlist?list=PL-old');
      expect(channel.episodes).toEqual([
        {
          id: 'old-1',
          title: 'Old episode',
          description: 'From the summary',
          link: undefined,
          thumbnailUrl: undefined,
          publishedAt: new Date('2024-07-25T14:54:00.000Z'),
          durationInSeconds: 706,
          enclosure: { mediaPath: 'old-1.mp4', type: 'video/mp4', length: 12345 }
        }
      ]);
    });

    it('should keep document order and drop repeated guids', async () => {
      const item = (id: string) => `
    <item>
      <guid isPermaLink="false">${id}</guid>
      <pubDate>Thu, 25 Jul 2024 14:54:00 GMT</pubDate>
      <enclosure url="${BASE_URL}/${id}.mp4" length="0" type="video/mp4"/>
    </item>`;

      const channel = await parseChannel(feedPath, feedXml(item('c') + item('a') + item('c') + item('b')), BASE_URL);

      expect(channel.episodes.map(episode => episode.id)).toEqual(['c', 'a', 'b']);
      expect(channel.episodes[0].title).toBe('c');
      expect(channel.episodes[0].enclosure.length).toBeUndefined();
    });

    it('should accept a channel without items', async () => {
      const channel = await parseChannel(feedPath, feedXml(''), BASE_URL);

      expect(channel.episodes).toEqual([]);
    });

    it('should reject XML that is not well-formed', async () => {
      await expect(parseChannel(feedPath, '<rss><channel><title>x</title>', BASE_URL))
        .rejects.toThrow(`Existing feed ${feedPath} is malformed: not well-formed XML`);
    });

    it('should reject documents without an rss channel', async () => {
      await expect(parseChannel(feedPath, '<feed><entry/></feed>', BASE_URL))
        .rejects.toThrow('missing <rss><channel> element');
    });

    it('should reject items without a guid', async () => {
      const xml = feedXml(`
    <item>
      <title>No guid</title>
      <pubDate>Thu, 25 Jul 2024 14:54:00 GMT</pubDate>
      <enclosure url="${BASE_URL}/x.mp4" length="1" type="video/mp4"/>
    </item>`);

      await expect(parseChannel(feedPath, xml, BASE_URL)).rejects.toThrow('item #1 has no guid');
    });

    it('should reject items without an enclosure', async () => {
      const xml = feedXml(`
    <item>
      <guid>x</guid>
      <pubDate>Thu, 25 Jul 2024 14:54:00 GMT</pubDate>
    </item>`);

      await expect(parseChannel(feedPath, xml, BASE_URL)).rejects.toThrow('episode x has no enclosure url');
    });

    it('should reject an enclosure url that names no file', async () => {
      const xml = feedXml(`
    <item>
      <guid>x</guid>
      <pubDate>Thu, 25 Jul 2024 14:54:00 GMT</pubDate>
      <enclosure url="${BASE_URL}/.." length="1" type="video/mp4"/>
    </item>`);

      await expect(parseChannel(feedPath, xml, BASE_URL))
        .rejects.toThrow('episode x has an enclosure url without a file name');
    });

    it('should reject items with an unreadable pubDate', async () => {
      const xml = feedXml(`
    <item>
      <guid>x</guid>
      <pubDate>sometime last week</pubDate>
      <enclosure url="${BASE_URL}/x.mp4" length="1" type="video/mp4"/>
    </item>`);

      await expect(parseChannel(feedPath, xml, BASE_URL))
        .rejects.toThrow('episode x has an invalid pubDate "sometime last week"');
    });
  });

  describe('saveChannel', () => {
    it('should write the feed atomically without leaving a temporary file', async () => {
      await saveChannel(makeChannel(), { kind: 'file', path: feedPath });

      expect(await fs.pathExists(feedPath)).toBe(true);
      expect(await fs.pathExists(`${feedPath}.tmp`)).toBe(false);
    });

    it('should replace an existing feed and return the rendered document', async () => {
      await fs.writeFile(feedPath, 'old contents');

      const document = await saveChannel(makeChannel(), { kind: 'file', path: feedPath });

      expect(await fs.readFile(feedPath, 'utf-8')).toBe(`${document}\n`);
    });

    it('should produce byte-identical files for the same channel', async () => {
      const otherPath = path.join(tempDir, 'copy.rss');
      await saveChannel(makeChannel(), { kind: 'file', path: feedPath });
      await saveChannel(makeChannel(), { kind: 'file', path: otherPath });

      const first = await fs.readFile(feedPath, 'utf-8');
      const second = await fs.readFile(otherPath, 'utf-8');
      expect(second).toBe(first);
    });

    it('should print to the given sink instead of writing a file', async () => {
      const chunks: string[] = [];
      const sink = { write: (chunk: string) => chunks.push(chunk) > 0 };

      const document = await saveChannel(makeChannel(), { kind: 'stdout' }, undefined, sink);

      expect(chunks).toEqual([`${document}\n`]);
      expect(await fs.pathExists(feedPath)).toBe(false);
    });
  });
});
