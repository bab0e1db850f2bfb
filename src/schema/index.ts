export const typeDefs = `#graphql
  type XPEvent {
    id: ID!
    eventKind: String!
    xpAmount: Int!
    timestamp: String!
    subjectRef: String
    details: String
  }

  type XPState {
    userId: ID!
    currentXP: Int!
    level: Int!
    xpToNextLevel: Int!
    progressToNextLevel: Float!
    weeklyXP: Int!
    lastUpdate: String!
    history(limit: Int): [XPEvent!]!
  }

  type LeaderboardEntry {
    rank: Int!
    userId: ID!
    displayName: String!
    currentXP: Int!
    level: Int!
    avatarRef: String
    lastUpdated: String!
    periodKey: String!
  }

  type XPReward {
    name: String!
    amount: Int!
  }

  type AwardTicket {
    eventId: ID!
  }

  type LevelUp {
    userId: ID!
    newLevel: Int!
  }

  type XPGain {
    userId: ID!
    amount: Int!
    eventKind: String!
    eventId: ID!
  }

  type AwardOutcome {
    userId: ID!
    eventId: ID!
    amount: Int!
    eventKind: String!
    recorded: Boolean!
    duplicate: Boolean
    currentXP: Int
    code: String
    message: String
  }

  type Milestone {
    userId: ID!
    kind: String!
    value: Int!
  }

  type ReconcileReport {
    repaired: Int!
    failed: Int!
    pending: Int!
  }

  type Query {
    xpState(userId: ID!): XPState!
    globalLeaderboard(periodKey: String, limit: Int): [LeaderboardEntry!]!
    friendsLeaderboard(periodKey: String, friendIds: [ID!]!): [LeaderboardEntry!]!
    currentPeriod: String!
    xpRewards: [XPReward!]!
  }

  type Mutation {
    awardXP(userId: ID!, amount: Int!, eventKind: String!, subjectRef: String, details: String, eventId: ID): AwardTicket!
    visitPlace(userId: ID!, placeId: ID!, placeName: String!, firstVisit: Boolean): AwardTicket!
    completeMission(userId: ID!, missionId: ID!, title: String!, xpReward: Int!): AwardTicket!
    reconcileLeaderboard: ReconcileReport!
  }

  type Subscription {
    levelUp(userId: ID!): LevelUp!
    xpGained(userId: ID!): XPGain!
    awardOutcome(userId: ID!): AwardOutcome!
    milestoneReached(userId: ID!): Milestone!
    xpState(userId: ID!): XPState!
    leaderboardUpdated(periodKey: String): Boolean!
  }
` as const;
