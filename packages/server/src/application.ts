/**
 * Object graph for one running bot
 */

import { ClaudeAgentModel, ConversationMemory, DocumentAgent, type AgentModel } from '@docdesk/agent';
import {
  AuthorizationFlowCoordinator,
  CredentialStore,
  GoogleOAuthTokenClient,
  GoogleServiceFactory,
  RequestIdentityContext,
  type GoogleClientConfig,
  type OAuthTokenClient,
} from '@docdesk/auth';
import { MessageHandler } from '@docdesk/bot';
import { ConfigurationError, type Environment } from '@docdesk/config';
import { GoogleDocumentService, createDocumentTools, type DocumentService } from '@docdesk/docs-tools';
import { CallbackServer, DeferredUserNotifier } from '@docdesk/http-server';
import { CredentialRecordStoreFactory, type CredentialRecordStore } from '@docdesk/persistence';
import { WorkerPool, type ToolRegistry } from '@docdesk/tools';

export interface ApplicationOptions {
  env: Environment;
  clientConfig: GoogleClientConfig;
  /** Defaults to the store selected by CREDENTIAL_STORE_TYPE */
  records?: CredentialRecordStore;
  /** Defaults to the Google OAuth client built from clientConfig */
  tokenClient?: OAuthTokenClient;
  /** Defaults to Claude, which needs ANTHROPIC_API_KEY */
  model?: AgentModel;
  /** Defaults to Google Docs and Drive with the caller's credentials */
  documents?: DocumentService;
}

export interface Application {
  identity: RequestIdentityContext;
  credentials: CredentialStore;
  coordinator: AuthorizationFlowCoordinator;
  tools: ToolRegistry;
  agent: DocumentAgent;
  handler: MessageHandler;
  /** Attach the chat client's DM notifier once it has logged in */
  notifier: DeferredUserNotifier;
  callbackServer: CallbackServer;
}

function createModel(env: Environment): AgentModel {
  if (!env.ANTHROPIC_API_KEY) {
    throw new ConfigurationError('Missing required secret: ANTHROPIC_API_KEY', ['ANTHROPIC_API_KEY']);
  }
  return new ClaudeAgentModel({
    apiKey: env.ANTHROPIC_API_KEY,
    model: env.AGENT_MODEL,
    maxTokens: env.AGENT_MAX_TOKENS,
  });
}

export function createApplication(options: ApplicationOptions): Application {
  const { env, clientConfig } = options;

  const identity = new RequestIdentityContext();
  const records =
    options.records ??
    CredentialRecordStoreFactory.create({ type: env.CREDENTIAL_STORE_TYPE, directory: env.TOKENS_DIR });
  const tokenClient = options.tokenClient ?? new GoogleOAuthTokenClient(clientConfig);
  const credentials = new CredentialStore(records, tokenClient);
  const coordinator = new AuthorizationFlowCoordinator(tokenClient, credentials);

  const documents =
    options.documents ??
    new GoogleDocumentService(new GoogleServiceFactory({ credentials, identity, clientConfig }));
  const tools = createDocumentTools({
    documents,
    diaryDocumentId: env.GOOGLE_DIARY_DOC_ID || undefined,
  });

  const agent = new DocumentAgent({
    model: options.model ?? createModel(env),
    tools,
    pool: new WorkerPool(env.TOOL_WORKER_CONCURRENCY, identity),
    memory: new ConversationMemory(),
    maxIterations: env.AGENT_MAX_ITERATIONS,
  });

  const handler = new MessageHandler({ credentials, coordinator, identity, agent });
  const notifier = new DeferredUserNotifier();
  const callbackServer = new CallbackServer({
    port: env.OAUTH_CALLBACK_PORT,
    host: env.OAUTH_CALLBACK_HOST,
    coordinator,
    notifier,
  });

  return { identity, credentials, coordinator, tools, agent, handler, notifier, callbackServer };
}
