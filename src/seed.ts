import 'dotenv/config';
import mongoose from 'mongoose';

import { loadConfig } from './config';
import Leaderboard from './models/Leaderboard';
import User from './models/User';
import { userPath } from './store/paths';
import { MongoDocumentStore } from './store/mongo';
import { DocumentStore } from './store/types';
import { placeVisitAward, missionCompletionAward, rewardAward } from './xp/rewards';
import { XPService } from './xp/service';
import { AwardInput } from './xp/types';

export interface DemoUser {
  id: string;
  displayName: string;
  avatar: string;
  awards: AwardInput[];
}

export const DEMO_USERS: DemoUser[] = [
  {
    id: 'demo-ana',
    displayName: 'Ana',
    avatar: 'avatars/ana.png',
    awards: [
      placeVisitAward('place-harbor', 'Harbor Market', true),
      missionCompletionAward({ id: 'mission-sunrise', title: 'Catch the sunrise', xpReward: 200 }),
      rewardAward('addReview', 'Harbor Market'),
    ],
  },
  {
    id: 'demo-ben',
    displayName: 'Ben',
    avatar: 'avatars/ben.png',
    awards: [
      placeVisitAward('place-gallery', 'Old Town Gallery'),
      rewardAward('checkIn'),
      missionCompletionAward({ id: 'mission-rooftop', title: 'Find a rooftop view', xpReward: 300 }),
      rewardAward('monthlyBonus'),
    ],
  },
  {
    id: 'demo-cleo',
    displayName: 'Cleo',
    avatar: '',
    awards: [rewardAward('sharePlace'), placeVisitAward('place-park', 'Riverside Park', true)],
  },
];

/** Writes the demo profiles, then replays their awards through the engine. */
export const seedDemoData = async (store: DocumentStore, xp: XPService, users: DemoUser[] = DEMO_USERS) => {
  let awarded = 0;
  for (const user of users) {
    await store.set(userPath(user.id), { displayName: user.displayName, avatar: user.avatar });
    for (const award of user.awards) {
      await xp.award(user.id, award);
      awarded++;
    }
  }
  console.log(`🌱 ${users.length} пользователей, ${awarded} начислений XP.`);
  return { users: users.length, awards: awarded };
};

const run = async () => {
  const config = loadConfig();
  if (config.store.driver !== 'mongo') {
    throw new Error('Сидинг нужен только для XP_STORE=mongo');
  }

  await mongoose.connect(config.store.mongoUri);
  console.log('✅ MongoDB подключён для сидинга');

  console.log('🗑️ Очистка базы данных...');
  await User.deleteMany({});
  await Leaderboard.deleteMany({});

  const store = new MongoDocumentStore();
  const xp = new XPService({ store });
  await seedDemoData(store, xp);
  await xp.close();
  await store.close();

  await mongoose.disconnect();
  console.log('🔌 MongoDB отключён.');
};

if (require.main === module) {
  run().catch((err) => {
    console.error('❌ Ошибка при заполнении базы данных:', err);
    process.exit(1);
  });
}
