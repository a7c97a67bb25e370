import { describe, expect, it } from 'vitest';
import { getSocialMediaRecommendations } from './social_recommendations';

function words(count: number): string {
  return Array.from({ length: count }, () => 'word').join(' ');
}

describe('getSocialMediaRecommendations', () => {
  it('flags a short LinkedIn post missing keywords and a question', () => {
    expect(getSocialMediaRecommendations('linkedin', 'Big news today.', ['marketing'])).toEqual([
      'LinkedIn posts perform better with 100-200 words. Consider adding more content.',
      'Include industry-specific keywords in your LinkedIn post for better visibility.',
      'Consider adding a question to encourage engagement and comments.',
      'Add a clear call-to-action at the end of your LinkedIn post.',
      'Add emojis to make your linkedin post more engaging and eye-catching.',
    ]);
  });

  it('always asks LinkedIn posts for a call-to-action', () => {
    const post = `${words(148)} marketing? 🚀`;

    expect(getSocialMediaRecommendations('linkedin', post, ['Marketing'])).toEqual([
      'Add a clear call-to-action at the end of your LinkedIn post.',
    ]);
  });

  it('flags a long LinkedIn post', () => {
    const recommendations = getSocialMediaRecommendations('linkedin', `${words(501)}?`, []);

    expect(recommendations[0]).toBe(
      'Your LinkedIn post is quite long. Consider keeping it under 500 words for better engagement.'
    );
  });

  it('checks tweet hashtags and links', () => {
    expect(getSocialMediaRecommendations('twitter', 'Launch day #startup #ai #saas #cloud 🔥', [])).toEqual([
      'Too many hashtags can reduce engagement. Limit to 1-2 hashtags on Twitter.',
      'Consider adding a relevant link to drive traffic.',
    ]);
    expect(getSocialMediaRecommendations('twitter', 'Read this https://example.com 👍', [])).toEqual([
      'Add 1-2 relevant hashtags to increase discoverability.',
    ]);
  });

  it('flags a long tweet', () => {
    const recommendations = getSocialMediaRecommendations('twitter', `${words(51)} #one https://example.com 👍`, []);

    expect(recommendations).toEqual(['Twitter posts perform better when concise. Consider keeping it under 50 words.']);
  });

  it('checks Instagram hashtags, length and tags', () => {
    expect(getSocialMediaRecommendations('instagram', 'Sunny day #a #b #c', [])).toEqual([
      'Instagram posts perform better with 5-15 relevant hashtags.',
      'Add more context to your Instagram caption for better engagement.',
      'Consider tagging relevant accounts to increase visibility.',
      'Add emojis to make your instagram post more engaging and eye-catching.',
    ]);
  });

  it('flags more than 30 Instagram hashtags', () => {
    const tags = Array.from({ length: 31 }, (_, i) => `#t${i}`).join(' ');
    const recommendations = getSocialMediaRecommendations('instagram', `${words(60)} ${tags} @shop ✅`, []);

    expect(recommendations).toEqual(['Instagram limits posts to 30 hashtags. Remove some hashtags.']);
  });

  it('only checks emojis on other platforms', () => {
    expect(getSocialMediaRecommendations('youtube', 'Watch now', [])).toEqual([
      'Add emojis to make your youtube post more engaging and eye-catching.',
    ]);
    expect(getSocialMediaRecommendations('tiktok', 'Watch now 💯', [])).toEqual([]);
  });
});
