import { XP_REWARDS, detectMilestones, missionCompletionAward, placeVisitAward, rewardAward } from '@/xp/rewards';

describe('Rewards', () => {
  it('первое посещение стоит 75, повторное 50', () => {
    expect(placeVisitAward('place-1', 'Harbor Market', true)).toEqual({
      amount: 75,
      eventKind: 'first-visit',
      subjectRef: 'place-1',
      details: 'Harbor Market',
    });
    expect(placeVisitAward('place-1', 'Harbor Market').amount).toBe(XP_REWARDS.visitPlace);
  });

  it('миссия без награды получает стандартные 200', () => {
    expect(missionCompletionAward({ id: 'm1', title: 'Sunrise', xpReward: 0 }).amount).toBe(200);
    expect(missionCompletionAward({ id: 'm2', title: 'Rooftop', xpReward: 300 })).toEqual({
      amount: 300,
      eventKind: 'mission-complete',
      subjectRef: 'm2',
      details: 'Rooftop',
    });
  });

  it('rewardAward берёт сумму из каталога', () => {
    expect(rewardAward('checkIn')).toEqual({ amount: 15, eventKind: 'checkIn' });
    expect(rewardAward('addReview', 'Nice place')).toEqual({ amount: 30, eventKind: 'addReview', details: 'Nice place' });
  });

  it('detectMilestones: уровни кратные 5, отметки XP, недельная тысяча', () => {
    const reached = detectMilestones(
      { currentXP: 1900, level: 4, weeklyXP: 900 },
      { currentXP: 2600, level: 6, weeklyXP: 1600 },
    );

    expect(reached).toEqual([
      { kind: 'level', value: 5 },
      { kind: 'xp', value: 2500 },
      { kind: 'weekly', value: 1000 },
    ]);
  });

  it('пройденные ранее вехи не повторяются', () => {
    expect(
      detectMilestones({ currentXP: 600, level: 2, weeklyXP: 1200 }, { currentXP: 650, level: 2, weeklyXP: 1250 }),
    ).toEqual([]);
  });
});
