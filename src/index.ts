import 'dotenv/config';
import express from 'express';
import http from 'http';
import cors from 'cors';

import { ApolloServer } from '@apollo/server';
import { ApolloServerPluginDrainHttpServer } from '@apollo/server/plugin/drainHttpServer';
import { expressMiddleware } from '@as-integrations/express5';

import { WebSocketServer } from 'ws';
import { useServer } from 'graphql-ws/lib/use/ws';
import { makeExecutableSchema } from '@graphql-tools/schema';

import mongoose from 'mongoose';
import { loadConfig } from './config';
import { pubsub } from './pubsub';
import { typeDefs } from './schema';
import { ResolverContext, resolvers } from './resolvers';
import { InMemoryDocumentStore } from './store/memory';
import { MongoDocumentStore } from './store/mongo';
import { DocumentStore } from './store/types';
import { XPService } from './xp/service';
import { XPSignals } from './xp/signals';

async function bootstrap() {
  const config = loadConfig();

  let store: DocumentStore;
  if (config.store.driver === 'mongo') {
    await mongoose.connect(config.store.mongoUri);
    console.log('✅ MongoDB подключён');
    store = new MongoDocumentStore();
  } else {
    console.log('🧪 XP store: in-memory (данные не сохраняются)');
    store = new InMemoryDocumentStore();
  }

  const xp = new XPService({
    store,
    signals: new XPSignals(pubsub),
    options: {
      retry: config.retry,
      maxConflictRetries: config.maxConflictRetries,
      sessionIdleMs: config.sessionIdleMs,
    },
  });
  xp.reconciler.start(config.reconcileIntervalMs);

  /**
   * Один контекст и для HTTP, и для WS
   */
  const context: ResolverContext = { xp, leaderboardLimit: config.leaderboardLimit };

  const app = express();
  const httpServer = http.createServer(app);

  const schema = makeExecutableSchema({
    typeDefs,
    resolvers,
  });

  /**
   * WebSocket (Subscriptions)
   */
  const wsServer = new WebSocketServer({
    server: httpServer,
    path: '/graphql',
  });

  const serverCleanup = useServer(
    {
      schema,
      context: async () => context,
    },
    wsServer,
  );

  /**
   * Apollo Server
   */
  const apolloServer = new ApolloServer<ResolverContext>({
    schema,
    plugins: [
      ApolloServerPluginDrainHttpServer({ httpServer }),
      {
        async serverWillStart() {
          return {
            async drainServer() {
              await serverCleanup.dispose();
            },
          };
        },
      },
    ],
  });

  await apolloServer.start();

  /**
   * HTTP (Queries + Mutations)
   */
  app.use(
    '/graphql',
    cors(),
    express.json(),
    expressMiddleware(apolloServer, {
      context: async () => context,
    }),
  );

  await new Promise<void>((resolve) => {
    httpServer.listen({ port: config.port }, resolve);
  });

  console.log(`🚀 HTTP ready at http://localhost:${config.port}/graphql`);
  console.log(`🔌 WS ready at ws://localhost:${config.port}/graphql`);

  const shutdown = async (signal: string) => {
    console.log(`🛑 ${signal}: останавливаемся...`);
    await apolloServer.stop();
    await xp.close();
    await store.close();
    if (config.store.driver === 'mongo') await mongoose.disconnect();
    console.log('🔌 Остановлено.');
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        console.error('❌ Shutdown error:', err);
        process.exit(1);
      });
    });
  }
}

bootstrap().catch((err) => {
  console.error('❌ Fatal error:', err);
  process.exit(1);
});
