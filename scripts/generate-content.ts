/**
 * Script to generate content from the command line
 *
 * Usage:
 * 1. Set OPENAI_API_KEY (and optionally BRAVE_SEARCH_API_KEY) in .env
 *
 * 2. Run: npm run generate -- --type blog_post --topic "Balcony herb gardens" \
 *      --keywords "herb garden,balcony" --tone conversational --export
 *
 *    When --topic is omitted you are prompted for it.
 *
 * 3. The final content is printed, followed by its SEO score and stage history
 */

import * as readline from 'readline';
import { parseArgs } from 'util';
import { loadConfig, loadEnvFile } from '../lib/config';
import { createContentRequest } from '../lib/content_request';
import { errorMessage } from '../lib/errors';
import { exportContent } from '../lib/export';
import { createOpenAIModel } from '../lib/model_client';
import { createSearchProvider } from '../lib/research';
import { runContentWorkflow } from '../lib/workflow';

loadEnvFile();

function question(query: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  return new Promise((resolve) => {
    rl.question(query, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
}

async function main() {
  const { values } = parseArgs({
    options: {
      type: { type: 'string', default: 'blog_post' },
      topic: { type: 'string' },
      tone: { type: 'string' },
      audience: { type: 'string' },
      keywords: { type: 'string' },
      words: { type: 'string' },
      instructions: { type: 'string' },
      'no-research': { type: 'boolean', default: false },
      export: { type: 'boolean', default: false },
    },
  });

  const topic = values.topic ?? (await question('Topic: '));

  const contentRequest = createContentRequest({
    content_type: values.type,
    topic,
    tone: values.tone,
    audience: values.audience,
    keywords: values.keywords,
    word_count: values.words === undefined ? undefined : Number(values.words),
    include_research: !values['no-research'],
    custom_instructions: values.instructions,
  });

  const config = loadConfig();
  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.warn('\nCancelling after the current stage...');
    controller.abort();
  });

  const response = await runContentWorkflow(
    contentRequest,
    { model: createOpenAIModel(config), search: createSearchProvider(config) },
    { timeoutMs: config.requestTimeoutMs, refinement: config.refinement, signal: controller.signal }
  );

  console.log('\n' + '='.repeat(60) + '\n');
  console.log(response.content);
  console.log('\n' + '='.repeat(60));

  if (response.metadata.seo_score !== undefined) {
    console.log(`SEO score: ${response.metadata.seo_score.toFixed(1)}`);
  }
  for (const record of response.metadata.stage_history) {
    console.log(`  ${record.stage}: ${record.status}${record.error ? ` (${record.error})` : ''}`);
  }

  if (values.export && response.content) {
    exportContent(response.content, contentRequest.content_type, config.exportDir);
  }
}

main().catch((error) => {
  console.error('Error:', errorMessage(error));
  process.exit(1);
});
