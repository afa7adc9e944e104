import { Agent } from "undici";

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

/** Dispatcher for gateway requests; `undefined` keeps undici's global one. */
export function getGatewayDispatcher(ignoreHttpsErrors: boolean): Agent | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

export async function closeGatewayDispatcher(): Promise<void> {
  if (!insecureAgent) {
    return;
  }
  const agent = insecureAgent;
  insecureAgent = undefined;
  await agent.close();
}
