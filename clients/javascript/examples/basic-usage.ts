/**
 * Basic usage example
 */

import { TubeChatClient, TranscriptUnavailableError } from '../src';

async function main() {
  const videoUrl = process.argv[2];
  const questions = process.argv.slice(3);

  if (!videoUrl) {
    console.log('Usage: tsx examples/basic-usage.ts <youtube_url> [question...]');
    console.log('Example: tsx examples/basic-usage.ts https://youtu.be/VIDEO_ID "What is the main topic?"');
    process.exit(1);
  }

  const client = new TubeChatClient({
    baseUrl: 'http://localhost:8000/api',
  });

  console.log(`Summarizing: ${videoUrl}`);

  let sessionId: string;
  try {
    const res = await client.summarize(videoUrl);
    sessionId = res.session_id;
    console.log(`✓ Video ${res.video_id} (${res.transcript_length.toLocaleString()} characters)`);
    console.log(`\n${res.summary}\n`);
  } catch (error) {
    if (error instanceof TranscriptUnavailableError) {
      console.log(`✗ ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  for (const question of questions) {
    const { answer } = await client.chat(sessionId, question);
    console.log(`Q: ${question}\nA: ${answer}\n`);
  }

  const history = await client.getHistory(sessionId);
  console.log(`Session ${sessionId} has ${history.turns.length} turn(s)`);

  await client.deleteSession(sessionId);
  console.log('✓ Session deleted');
}

main().catch((error) => {
  console.error('Error:', String(error));
  process.exit(1);
});
