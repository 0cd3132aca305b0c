import { load, type CheerioAPI } from 'cheerio';
import type { PageParser, Post, Profile } from '../api/types';
import { fromUnixSeconds, parseCount } from './normalizer';

function text($: CheerioAPI, selector: string, scope?: string): string {
  const node = scope ? $(scope).find(selector) : $(selector);
  return node.first().text().replace(/\s+/g, ' ').trim();
}

/**
 * Parses the legacy stream markup: one `li.js-stream-item` per post, the
 * post attributes on its inner `div.tweet`. Items missing an id or a
 * timestamp are skipped; a page with no parsable item yields `[]`.
 */
export class HtmlPageParser implements PageParser<Post> {
  parseRecords(html: string): Post[] {
    if (!html.trim()) return [];

    const $ = load(html);
    const posts: Post[] = [];

    $('li.js-stream-item').each((_, item) => {
      const tweet = $(item).find('div.tweet').first();
      const id = tweet.attr('data-tweet-id') ?? $(item).attr('data-item-id');
      const timestamp = fromUnixSeconds(tweet.find('span._timestamp').first().attr('data-time'));
      if (!id || !timestamp) return;

      const stat = (action: string) =>
        parseCount(tweet.find(`span.ProfileTweet-action--${action} span.ProfileTweet-actionCount`).first().attr('data-tweet-stat-count'));

      posts.push({
        id,
        timestamp,
        screenName: tweet.attr('data-screen-name') ?? '',
        username: tweet.attr('data-name') ?? '',
        userId: tweet.attr('data-user-id') ?? '',
        text: tweet.find('p.tweet-text').first().text().trim(),
        url: tweet.attr('data-permalink-path') ?? '',
        replies: stat('reply'),
        reposts: stat('retweet'),
        likes: stat('favorite'),
        isReply: tweet.attr('data-is-reply-to') === 'true',
      });
    });

    return posts;
  }

  parseProfile(html: string): Profile | null {
    const $ = load(html);
    const card = 'div.ProfileHeaderCard';
    if ($(card).length === 0) return null;

    const navCount = (item: string) =>
      parseCount($(`li.ProfileNav-item--${item} span.ProfileNav-value`).first().attr('data-count'));

    return {
      screenName: text($, 'b.u-linkComplex-target', card),
      fullName: text($, 'a.ProfileHeaderCard-nameLink', card),
      bio: text($, 'p.ProfileHeaderCard-bio', card),
      location: text($, 'span.ProfileHeaderCard-locationText', card),
      joinDate: $(card).find('span.ProfileHeaderCard-joinDateText').first().attr('title') ?? '',
      posts: navCount('tweets'),
      following: navCount('following'),
      followers: navCount('followers'),
      likes: navCount('favorites'),
    };
  }
}
