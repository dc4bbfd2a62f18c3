/**
 * Basic Usage Example
 *
 * Connects to a NetApp, initialises it, sends a few JSON messages and
 * prints the results it sends back.
 */

import { ChannelType, ControlCommandType, callbackInfo, createClientFromEnv, loadDotenv } from '../src/index';

async function main() {
  // 1. Configuration from .env (NETAPP_ADDRESS, NETAPP_DEBUG, ...)
  loadDotenv();

  const client = createClientFromEnv({
    callbacks: {
      results: callbackInfo(
        ChannelType.JSON,
        (value, timestamp) => console.log(`✓ Result for ${timestamp}:`, value),
        (_raw, reason) => console.error(`✗ ${reason.message}`)
      ),
    },
  });

  // 2. Connect, waiting for the NetApp to come up, and initialise it
  const reply = await client.register({ model: 'default' }, { waitUntilAvailable: true, waitTimeoutMs: 30000 });
  console.log('✓ Registered:', reply.data ?? reply.message ?? 'ok');

  // 3. Send data
  for (let i = 0; i < 5; i++) {
    client.sendData({ reading: i }, 'readings', ChannelType.JSON_LZ4);
  }
  console.log('✓ Sent 5 readings');

  // 4. Ask for the current state
  const state = await client.sendControlCommand({ type: ControlCommandType.GET_STATE });
  console.log('✓ NetApp state:', state.data);

  await new Promise((resolve) => setTimeout(resolve, 1000));
  console.log('✓ Channel stats:', client.stats().channels);

  client.disconnect();
  console.log('\n--- Example completed successfully ---');
}

// Run example
main().catch(console.error);
