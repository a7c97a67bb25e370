import { SocialPlatform } from '@/types';

const ENGAGEMENT_EMOJIS = ['😀', '👍', '🔥', '❤️', '✅', '👏', '🙌', '💯', '⭐', '🚀'];

const WORD = /\b\w+\b/g;
const HASHTAG = /#\w+/g;

function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}

/**
 * Platform-specific posting advice for a piece of social content.
 * LinkedIn, Twitter and Instagram have their own rules; every platform
 * gets the emoji check.
 */
export function getSocialMediaRecommendations(
  platform: SocialPlatform,
  content: string,
  keywords: readonly string[]
): string[] {
  const recommendations: string[] = [];
  const wordCount = countMatches(content.toLowerCase(), WORD);
  const hashtagCount = countMatches(content, HASHTAG);

  switch (platform) {
    case 'linkedin': {
      if (wordCount < 100) {
        recommendations.push('LinkedIn posts perform better with 100-200 words. Consider adding more content.');
      } else if (wordCount > 500) {
        recommendations.push('Your LinkedIn post is quite long. Consider keeping it under 500 words for better engagement.');
      }

      const lower = content.toLowerCase();
      if (keywords.length > 0 && !keywords.some((keyword) => lower.includes(keyword.toLowerCase()))) {
        recommendations.push('Include industry-specific keywords in your LinkedIn post for better visibility.');
      }

      if (!content.includes('?')) {
        recommendations.push('Consider adding a question to encourage engagement and comments.');
      }

      recommendations.push('Add a clear call-to-action at the end of your LinkedIn post.');
      break;
    }

    case 'twitter':
      if (wordCount > 50) {
        recommendations.push('Twitter posts perform better when concise. Consider keeping it under 50 words.');
      }

      if (hashtagCount === 0) {
        recommendations.push('Add 1-2 relevant hashtags to increase discoverability.');
      } else if (hashtagCount > 3) {
        recommendations.push('Too many hashtags can reduce engagement. Limit to 1-2 hashtags on Twitter.');
      }

      if (!content.includes('https://') && !content.includes('http://')) {
        recommendations.push('Consider adding a relevant link to drive traffic.');
      }
      break;

    case 'instagram':
      if (hashtagCount < 5) {
        recommendations.push('Instagram posts perform better with 5-15 relevant hashtags.');
      } else if (hashtagCount > 30) {
        recommendations.push('Instagram limits posts to 30 hashtags. Remove some hashtags.');
      }

      if (wordCount < 50) {
        recommendations.push('Add more context to your Instagram caption for better engagement.');
      } else if (wordCount > 300) {
        recommendations.push(
          'Your Instagram caption is quite long. Consider keeping the main message in the first 125 characters.'
        );
      }

      if (!content.includes('@')) {
        recommendations.push('Consider tagging relevant accounts to increase visibility.');
      }
      break;

    default:
      break;
  }

  if (!ENGAGEMENT_EMOJIS.some((emoji) => content.includes(emoji))) {
    recommendations.push(`Add emojis to make your ${platform} post more engaging and eye-catching.`);
  }

  return recommendations;
}
