import { Agent, setGlobalDispatcher, type Dispatcher } from 'undici';

// Request deadlines come from DocsApiClient's AbortSignal (FETCH_TIMEOUT);
// the dispatcher adds none of its own.
const agentOptions: Agent.Options = {
  headersTimeout: 0,
  bodyTimeout: 0,
  connect: { timeout: 10_000 },
  keepAliveTimeout: 30_000,
};

const dispatcher: Dispatcher = new Agent(agentOptions);

setGlobalDispatcher(dispatcher);
