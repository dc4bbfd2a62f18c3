/**
 * H.264 Streaming Example
 *
 * Streams a camera, file or test pattern to a NetApp as H.264 and prints
 * each result next to the capture time of the frame it belongs to.
 *
 *   tsx examples/h264-stream.ts                 # synthetic test pattern
 *   tsx examples/h264-stream.ts /dev/video0 v4l2
 *   tsx examples/h264-stream.ts clip.mp4
 */

import {
  ChannelType,
  FfmpegSource,
  StreamSender,
  SyntheticSource,
  callbackInfo,
  createClientFromEnv,
  loadDotenv,
  type CaptureSource,
} from '../src/index';

function openSource(input: string | undefined, inputFormat: string | undefined): CaptureSource {
  if (!input) {
    return new SyntheticSource({ width: 640, height: 480, fps: 30, frameCount: 300 });
  }
  return new FfmpegSource({ input, inputFormat, width: 640, height: 480, fps: 30, live: inputFormat !== undefined });
}

async function main() {
  loadDotenv();
  const [input, inputFormat] = process.argv.slice(2);

  const client = createClientFromEnv({
    callbacks: {
      results: callbackInfo(ChannelType.JSON, (value, timestamp) => {
        console.log(`✓ Frame captured at ${timestamp} (${Date.now() - timestamp}ms ago):`, value);
      }),
    },
    onSendError: (channel, error) => console.error(`✗ Send on ${channel} failed: ${error.message}`),
  });

  await client.register({}, { waitUntilAvailable: true });
  console.log('✓ Registered');

  const sender = new StreamSender(openSource(input, inputFormat), client, { channel: 'image' });
  process.once('SIGINT', () => sender.stop());

  const result = await sender.start();
  await client.stopVideo();
  console.log(`✓ Sent ${result.framesSent} frames (${result.stoppedBy})`);
  if (result.error) {
    console.error(`✗ ${result.error.message}`);
  }

  console.log('✓ Channel stats:', client.stats().channels.image);
  client.disconnect();
}

// Run example
main().catch(console.error);
