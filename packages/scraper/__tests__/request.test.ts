import { describe, it, expect } from 'vitest';
import { requestPage, requestProfile } from '../src/ingestion/request';
import { TransportError } from '../src/api/client';
import {
  BASE_URL,
  ScriptedFetcher,
  envelope,
  failingFetcher,
  ids,
  item,
  makeContext,
  sequenceFetcher,
  streamHtml,
} from './helpers';

const searchFirstPage = { query: 'cats', lang: '', cursor: null, fromUser: false };
const searchContinuation = { query: 'cats', lang: '', cursor: '500', fromUser: false };

describe('requestPage', () => {
  it.each([1, 3, 10])('makes exactly %i attempts when every fetch fails', async (retries) => {
    const fetcher = failingFetcher();

    const result = await requestPage(makeContext(fetcher, { retries }), searchFirstPage);

    expect(fetcher.urls).toHaveLength(retries);
    expect(result).toEqual({ records: [], cursor: null });
  });

  it('parses a first page directly and keys the cursor off the last record', async () => {
    const fetcher = sequenceFetcher([streamHtml([item('1003', 1600000300), item('1002', 1600000200)])]);

    const result = await requestPage(makeContext(fetcher), searchFirstPage);

    expect(ids(result.records)).toEqual(['1003', '1002']);
    expect(result.cursor).toBe('1002');
    expect(fetcher.urls).toEqual([`${BASE_URL}/search?f=tweets&vertical=default&q=cats&l=`]);
  });

  it('reads an empty cursor as a first page without an envelope', async () => {
    const fetcher = sequenceFetcher([streamHtml([item('7', 1600000000)])]);

    const result = await requestPage(makeContext(fetcher), { ...searchFirstPage, cursor: '' });

    expect(fetcher.urls).toHaveLength(1);
    expect(ids(result.records)).toEqual(['7']);
  });

  it('unwraps the envelope of a continuation page', async () => {
    const fetcher = sequenceFetcher([envelope([item('499', 1600000100)], '499')]);

    const result = await requestPage(makeContext(fetcher), searchContinuation);

    expect(ids(result.records)).toEqual(['499']);
    expect(result.cursor).toBe('499');
    expect(fetcher.urls[0]).toContain('max_position=500');
  });

  it('retries after a malformed envelope', async () => {
    const fetcher = sequenceFetcher(['<html>not json</html>', envelope([item('499', 1600000100)])]);

    const result = await requestPage(makeContext(fetcher), searchContinuation);

    expect(fetcher.urls).toHaveLength(2);
    expect(ids(result.records)).toEqual(['499']);
  });

  it('retries after an envelope without items_html', async () => {
    const fetcher = sequenceFetcher([JSON.stringify({ min_position: '400' }), envelope([item('499', 1600000100)])]);

    const result = await requestPage(makeContext(fetcher), searchContinuation);

    expect(fetcher.urls).toHaveLength(2);
    expect(fetcher.urls[1]).toContain('max_position=500');
    expect(ids(result.records)).toEqual(['499']);
  });

  it('moves to the reported min_position when a page comes back empty', async () => {
    const fetcher = sequenceFetcher([envelope([], '450'), envelope([item('449', 1600000100)])]);

    const result = await requestPage(makeContext(fetcher), searchContinuation);

    expect(fetcher.urls[0]).toContain('max_position=500');
    expect(fetcher.urls[1]).toContain('max_position=450');
    expect(ids(result.records)).toEqual(['449']);
  });

  it('keeps the cursor when an empty page reports no min_position', async () => {
    const fetcher = sequenceFetcher([envelope([], null), envelope([item('499', 1600000100)])]);

    await requestPage(makeContext(fetcher), searchContinuation);

    expect(fetcher.urls[1]).toContain('max_position=500');
  });

  it('gives up within the budget when empty pages repeat the same min_position', async () => {
    const fetcher = sequenceFetcher([envelope([], '450')]);

    const result = await requestPage(makeContext(fetcher, { retries: 4 }), searchContinuation);

    expect(fetcher.urls).toHaveLength(4);
    expect(result).toEqual({ records: [], cursor: null });
  });

  it('recovers from a transient transport failure', async () => {
    const fetcher = new ScriptedFetcher((url, call) => {
      if (call === 0) throw new TransportError(url, undefined);
      return streamHtml([item('7', 1600000000)]);
    });

    const result = await requestPage(makeContext(fetcher), searchFirstPage);

    expect(fetcher.urls).toHaveLength(2);
    expect(result.cursor).toBe('7');
  });

  it('does not start an attempt once aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fetcher = sequenceFetcher([streamHtml([item('7', 1600000000)])]);

    const result = await requestPage(makeContext(fetcher, { signal: controller.signal }), searchFirstPage);

    expect(fetcher.urls).toHaveLength(0);
    expect(result).toEqual({ records: [], cursor: null });
  });

  it('discards a response that lands after abort', async () => {
    const controller = new AbortController();
    const fetcher = new ScriptedFetcher(() => {
      controller.abort();
      return streamHtml([item('7', 1600000000)]);
    });

    const result = await requestPage(makeContext(fetcher, { signal: controller.signal }), searchFirstPage);

    expect(fetcher.urls).toHaveLength(1);
    expect(result.records).toEqual([]);
  });
});

const profileHtml = `
<div class="ProfileHeaderCard">
  <h1><a class="ProfileHeaderCard-nameLink">Alice Example</a></h1>
  <h2><a class="ProfileHeaderCard-screennameLink">@<b class="u-linkComplex-target">alice</b></a></h2>
  <p class="ProfileHeaderCard-bio">Writes about cats.</p>
  <span class="ProfileHeaderCard-locationText"> Lisbon </span>
  <span class="ProfileHeaderCard-joinDateText" title="9:00 AM - 1 Jan 2012">Joined January 2012</span>
</div>
<ul>
  <li class="ProfileNav-item--tweets"><span class="ProfileNav-value" data-count="1234">1,234</span></li>
  <li class="ProfileNav-item--following"><span class="ProfileNav-value" data-count="56">56</span></li>
  <li class="ProfileNav-item--followers"><span class="ProfileNav-value" data-count="789">789</span></li>
  <li class="ProfileNav-item--favorites"><span class="ProfileNav-value" data-count="10">10</span></li>
</ul>`;

describe('requestProfile', () => {
  it('retries transport failures and returns the parsed profile', async () => {
    const fetcher = new ScriptedFetcher((url, call) => {
      if (call < 2) throw new TransportError(url, 502);
      return profileHtml;
    });

    const profile = await requestProfile(makeContext(fetcher), 'alice');

    expect(fetcher.urls).toEqual([`${BASE_URL}/alice`, `${BASE_URL}/alice`, `${BASE_URL}/alice`]);
    expect(profile).toEqual({
      screenName: 'alice',
      fullName: 'Alice Example',
      bio: 'Writes about cats.',
      location: 'Lisbon',
      joinDate: '9:00 AM - 1 Jan 2012',
      posts: 1234,
      following: 56,
      followers: 789,
      likes: 10,
    });
  });

  it('returns null after exhausting the budget', async () => {
    const fetcher = failingFetcher();

    expect(await requestProfile(makeContext(fetcher, { retries: 2 }), 'alice')).toBeNull();
    expect(fetcher.urls).toHaveLength(2);
  });

  it('returns the parser verdict without retrying when the page has no profile', async () => {
    const fetcher = sequenceFetcher(['<html><body>Sorry, that page does not exist</body></html>']);

    expect(await requestProfile(makeContext(fetcher), 'ghost')).toBeNull();
    expect(fetcher.urls).toHaveLength(1);
  });
});
