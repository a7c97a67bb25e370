import { AudienceType, ContentType, ToneType } from '@/types';

export const CONTENT_TYPE_INSTRUCTIONS: Record<ContentType, string> = {
  blog_post: `Create a high-converting blog post with:
- A headline that uses numbers, power words, and creates curiosity
- An engaging introduction that hooks the reader with a problem or surprising fact
- Well-organized body with benefit-focused H2 and H3 subheadings
- Short paragraphs (1-3 sentences) for easy scanning
- Bullet points to highlight key benefits or takeaways
- A meta description line, internal links and links to authoritative sources
- Social proof elements like statistics, testimonials, or case studies
- A strong conclusion with a final, persuasive call-to-action`,
  social_media: `Create high-CTR social media content with:
- A pattern-interrupting first line that stops scrolling
- Concise, benefit-focused messaging that creates curiosity
- Strategic use of emojis to draw attention to key points
- A clear, compelling call-to-action with urgency elements
- Question-based engagement hooks that prompt responses
- Appropriate hashtags that extend reach
- Appropriate length for the platform with line breaks for scannability`,
  email: `Create a high-converting email with:
- A subject line that creates curiosity or promises specific value
- A compelling preheader that extends the subject line promise
- An opening line that immediately engages with a question or bold statement
- Short paragraphs (1-2 sentences) for easy mobile reading
- Bullet points to highlight key benefits
- A clear primary CTA repeated 2-3 times
- A P.S. section that reinforces the main benefit or adds urgency`,
  landing_page: `Create a high-converting landing page with:
- A headline that clearly communicates the unique value proposition
- A subheadline that expands on the main benefit or addresses objections
- A hero section with a clear, compelling primary CTA
- Benefit-focused sections with specific outcomes (not features)
- Trust indicators including testimonials with specific results
- Risk-reversal elements like guarantees or free trials
- An FAQ section that preemptively addresses objections`,
  product_description: `Create a compelling product description with:
- An attention-grabbing headline
- A clear explanation of what the product is
- Emphasis on key features and the benefits they deliver
- Technical specifications where relevant
- Sensory and emotional language
- A clear call-to-action`,
  ad_copy: `Create persuasive ad copy with:
- An attention-grabbing headline
- A clear value proposition
- Emotional triggers and a sense of urgency
- A strong call-to-action
- Appropriate length for the ad platform`,
  press_release: `Create a professional press release with:
- A compelling headline
- Dateline and location
- A strong lead paragraph with the 5 Ws (who, what, when, where, why)
- Relevant quotes from key stakeholders
- Boilerplate company information
- Contact information`,
  custom: `Create custom content following best practices for:
- Clear and engaging communication
- Proper structure and flow
- Appropriate tone and style
- Compelling calls-to-action where needed
- Relevant and accurate information`,
};

export const TONE_INSTRUCTIONS: Record<ToneType, string> = {
  professional: 'Use formal language, industry terminology, and maintain a serious, authoritative voice.',
  conversational: 'Write as if having a friendly conversation, using contractions, questions, and a warm, approachable style.',
  enthusiastic: 'Use energetic language, exclamations, and convey excitement and passion about the topic.',
  informative: 'Focus on facts, clear explanations, and educational content without unnecessary embellishment.',
  persuasive: 'Use compelling arguments, rhetorical questions, and persuasive techniques to convince the reader.',
  humorous: 'Incorporate appropriate humor, wit, and a light-hearted approach to engage the reader.',
  formal: 'Use proper grammar, avoid contractions, and maintain a sophisticated, academic tone.',
  casual: 'Use relaxed language, slang (when appropriate), and a laid-back, friendly approach.',
};

export const AUDIENCE_INSTRUCTIONS: Record<AudienceType, string> = {
  general: 'Write for a broad audience with varied knowledge levels, avoiding jargon and complex concepts without explanation.',
  technical: 'Use technical terminology, detailed explanations, and assume specialized knowledge in the subject area.',
  business: 'Focus on business value, ROI, and strategic implications using professional business language.',
  consumer: 'Emphasize benefits over features, use accessible language, and focus on how the product or service improves daily life.',
  expert: 'Use advanced terminology, in-depth analysis, and assume high-level understanding of the subject matter.',
  beginner: 'Provide clear explanations, avoid jargon, use analogies, and assume no prior knowledge of the subject.',
  youth: 'Use simple language, engaging examples, and a more energetic tone appropriate for younger audiences.',
  senior: 'Use clear, straightforward language, avoid trendy terms, and consider accessibility in your communication.',
};
