import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  Art19Connector,
  Art19ConfigSchema,
  PublishingConfigSchema,
  TwitterConfigSchema,
  TwitterConnector,
  WebsiteConfigSchema,
  WebsiteConnector,
  assembleEpisodeData,
  createEnabledPlatforms,
  defaultPost,
  truncatePost,
  weightedLength,
  websiteRecord,
  type Logger,
} from '../src/index.js';
import { jsonResponse, sampleContent, testConfig, testContext } from './helpers.js';

const episode = assembleEpisodeData('/audio/ep1.wav', sampleContent, { episodeId: 'ep-1' }, testConfig().episode);
const ctx = testContext();

const fetchMock = vi.fn<[string | URL | Request, RequestInit | undefined], Promise<Response>>();

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

function sent(i = 0) {
  const [url, init] = fetchMock.mock.calls[i];
  const body: unknown = init?.body === undefined ? undefined : JSON.parse(String(init.body));
  return { url: String(url), method: init?.method, headers: init?.headers, body };
}

// ---------------------------------------------------------------------------
// Art19
// ---------------------------------------------------------------------------

describe('Art19Connector', () => {
  const config = Art19ConfigSchema.parse({ apiToken: 'test-secret', seriesId: 'series-1' });

  it('creates the episode and derives its public URL', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(201, { data: { id: 'a19-1', attributes: {} } }));

    const result = await new Art19Connector(config).publish(episode, ctx);

    expect(result).toEqual({
      success: true,
      platform: 'art19',
      url: 'https://art19.com/episodes/a19-1',
      externalId: 'a19-1',
      details: { published: false },
    });
    const call = sent();
    expect(call.url).toBe('https://api.art19.com/episodes');
    expect(call.method).toBe('POST');
    expect(call.headers).toMatchObject({ authorization: 'Bearer test-secret', accept: 'application/vnd.api+json' });
    expect(call.body).toEqual({
      data: {
        type: 'episodes',
        attributes: {
          title: 'AI Trends in Asia',
          description: 'How teams across Asia are adopting AI tools.',
          content: '- Intro\n- Interviews\n- Outlook',
          season_number: 1,
          explicit: false,
          tags: [],
        },
        relationships: { series: { data: { type: 'series', id: 'series-1' } } },
      },
    });
  });

  it('prefers the URL returned by the API', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse(201, { data: { id: 'a19-2', attributes: { url: 'https://art19.com/shows/demo/episodes/a19-2' } } }),
    );
    const result = await new Art19Connector(config).publish(episode, ctx);
    expect(result.url).toBe('https://art19.com/shows/demo/episodes/a19-2');
  });

  it('marks the episode published when auto-publish is on', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse(201, { data: { id: 'a19-3', attributes: { published: false } } }))
      .mockResolvedValueOnce(jsonResponse(200, { data: { id: 'a19-3' } }));

    const result = await new Art19Connector({ ...config, autoPublish: true }).publish(episode, ctx);

    expect(result.details).toEqual({ published: true });
    expect(fetchMock).toHaveBeenCalledTimes(2);
    const patch = sent(1);
    expect(patch.url).toBe('https://api.art19.com/episodes/a19-3');
    expect(patch.method).toBe('PATCH');
    expect(patch.body).toMatchObject({ data: { id: 'a19-3', attributes: { published: true } } });
  });

  it('keeps the created episode id when marking it published fails', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse(201, { data: { id: 'a19-4', attributes: { published: false } } }))
      .mockResolvedValueOnce(new Response('boom', { status: 500 }));

    const result = await new Art19Connector({ ...config, autoPublish: true }).publish(episode, ctx);

    expect(result).toEqual({
      success: false,
      platform: 'art19',
      error: 'Art19 episode a19-4 was created but publishing it failed: Art19 HTTP 500: boom',
      externalId: 'a19-4',
      details: { published: false },
    });
  });

  it('reports API errors as a failed result', async () => {
    fetchMock.mockResolvedValueOnce(new Response('unauthorized', { status: 401 }));
    const result = await new Art19Connector(config).publish(episode, ctx);
    expect(result).toEqual({ success: false, platform: 'art19', error: 'Art19 HTTP 401: unauthorized' });
  });

  it('reports a malformed response as a failed result', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(201, { unexpected: true }));
    const result = await new Art19Connector(config).publish(episode, ctx);
    expect(result.success).toBe(false);
    expect(result.platform).toBe('art19');
  });

  it('does not call the API without credentials', async () => {
    const connector = new Art19Connector(Art19ConfigSchema.parse({}));
    expect(connector.isAvailable()).toBe(false);
    const result = await connector.publish(episode, ctx);
    expect(result.error).toBe('Art19 API not configured (apiToken and seriesId are required)');
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

// ---------------------------------------------------------------------------
// Website
// ---------------------------------------------------------------------------

describe('WebsiteConnector', () => {
  it('pushes the episode record to the content endpoint', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(200, { ok: true }));
    const connector = new WebsiteConnector(
      WebsiteConfigSchema.parse({
        apiEndpoint: 'https://site.test/api/episodes',
        apiToken: 'test-secret',
        siteUrl: 'https://site.test/',
      }),
    );

    const result = await connector.publish(episode, ctx);

    expect(result).toEqual({
      success: true,
      platform: 'website',
      url: 'https://site.test/episodes/ep-1',
      externalId: 'ep-1',
      details: { mode: 'api' },
    });
    const call = sent();
    expect(call.url).toBe('https://site.test/api/episodes');
    expect(call.headers).toMatchObject({ authorization: 'Bearer test-secret' });
    expect(call.body).toMatchObject({ action: 'add_episode', episode: websiteRecord(episode) });
  });

  it('uses the episode URL the endpoint returns', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(200, { episode_url: 'https://site.test/e/ep-1' }));
    const connector = new WebsiteConnector(WebsiteConfigSchema.parse({ apiEndpoint: 'https://site.test/api' }));
    const result = await connector.publish(episode, ctx);
    expect(result.url).toBe('https://site.test/e/ep-1');
  });

  it('falls back to the deploy hook when there is no endpoint', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(201, { job: { id: 'dep-9', state: 'PENDING' } }));
    const connector = new WebsiteConnector(WebsiteConfigSchema.parse({ deployHook: 'https://deploy.test/hook' }));

    const result = await connector.publish(episode, ctx);

    expect(result).toEqual({
      success: true,
      platform: 'website',
      url: undefined,
      externalId: 'dep-9',
      details: { mode: 'deploy_hook' },
    });
    expect(sent().body).toMatchObject({ episode_id: 'ep-1', deployment_type: 'episode_update' });
  });

  it('reports hook failures as a failed result', async () => {
    fetchMock.mockResolvedValueOnce(new Response('boom', { status: 500 }));
    const connector = new WebsiteConnector(WebsiteConfigSchema.parse({ deployHook: 'https://deploy.test/hook' }));
    const result = await connector.publish(episode, ctx);
    expect(result).toEqual({ success: false, platform: 'website', error: 'Deploy hook HTTP 500: boom' });
  });

  it('flattens the episode into the record the site renders', () => {
    expect(websiteRecord(episode)).toEqual({
      episode_id: 'ep-1',
      title: 'AI Trends in Asia',
      description: 'How teams across Asia are adopting AI tools.',
      show_notes: '- Intro\n- Interviews\n- Outlook',
      summary: 'Adoption is accelerating. Regulation is catching up.',
      duration: 0,
      language: 'English',
      tags: [],
      publication_date: null,
    });
  });
});

// ---------------------------------------------------------------------------
// Twitter
// ---------------------------------------------------------------------------

describe('defaultPost', () => {
  it('adds the first summary sentence and hashtags', () => {
    expect(defaultPost({ title: 'AI Trends', summary: 'Adoption grows. More later.' })).toBe(
      '🎧 New episode: AI Trends - Adoption grows #podcast #ai',
    );
  });

  it('omits the sentence when there is no summary', () => {
    expect(defaultPost({ title: 'AI Trends', summary: '' })).toBe('🎧 New episode: AI Trends #podcast #ai');
  });

  it('caps the post at 280 characters', () => {
    const title = 'a'.repeat(300);
    const post = defaultPost({ title, summary: 'Short.' });
    expect(post).toBe(`🎧 New episode: ${'a'.repeat(264)}`);
    expect(weightedLength(post)).toBe(280);
  });
});

describe('post length', () => {
  it('counts CJK characters and emoji as two', () => {
    expect(weightedLength('abc')).toBe(3);
    expect(weightedLength('新番組')).toBe(6);
    expect(weightedLength('🎧 hi')).toBe(5);
  });

  it('cuts Japanese copy to the weighted limit', () => {
    const post = truncatePost('あ'.repeat(200));
    expect(post).toBe('あ'.repeat(140));
  });

  it('never splits an emoji', () => {
    const post = truncatePost(`${'a'.repeat(279)}🎧`);
    expect(post).toBe('a'.repeat(279));
  });
});

describe('TwitterConnector', () => {
  const config = TwitterConfigSchema.parse({ bearerToken: 'test-secret' });

  it('posts the provided social copy', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(201, { data: { id: '123', text: 'New episode on AI in Asia' } }));

    const result = await new TwitterConnector(config).publish(episode, ctx);

    expect(result).toEqual({
      success: true,
      platform: 'twitter',
      url: 'https://twitter.com/i/web/status/123',
      externalId: '123',
      details: { text: 'New episode on AI in Asia' },
    });
    expect(sent().url).toBe('https://api.twitter.com/2/tweets');
    expect(sent().body).toEqual({ text: 'New episode on AI in Asia' });
  });

  it('builds a default post when the content has none', () => {
    const plain = assembleEpisodeData(
      '/audio/ep1.wav',
      { ...sampleContent, social_media: {} },
      { episodeId: 'ep-2' },
      testConfig().episode,
    );
    expect(new TwitterConnector(config).postText(plain)).toBe(
      '🎧 New episode: AI Trends in Asia - Adoption is accelerating #podcast #ai',
    );
  });
});

// ---------------------------------------------------------------------------
// Enabled set
// ---------------------------------------------------------------------------

describe('createEnabledPlatforms', () => {
  function recordingLogger(): Logger & { warnings: string[] } {
    const warnings: string[] = [];
    return { warnings, debug: () => undefined, info: () => undefined, error: () => undefined, warn: (m) => warnings.push(m) };
  }

  it('keeps configured platforms in launch order and skips the rest with a warning', () => {
    const logger = recordingLogger();
    const platforms = createEnabledPlatforms(
      PublishingConfigSchema.parse({
        art19: { apiToken: 'test-secret', seriesId: 'series-1' },
        twitter: { bearerToken: 'test-secret' },
      }),
      logger,
    );

    expect(platforms.map((p) => p.name)).toEqual(['art19', 'twitter']);
    expect(logger.warnings).toEqual(['Platform website is enabled but not configured; skipping']);
  });

  it('leaves out disabled platforms silently', () => {
    const logger = recordingLogger();
    const platforms = createEnabledPlatforms(
      PublishingConfigSchema.parse({
        art19: { enabled: false },
        website: { enabled: false },
        twitter: { bearerToken: 'test-secret' },
      }),
      logger,
    );
    expect(platforms.map((p) => p.name)).toEqual(['twitter']);
    expect(logger.warnings).toEqual([]);
  });
});
