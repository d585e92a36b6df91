export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

// A mutation never moves updatedAt behind its previous value, even if the
// wall clock steps backwards.
export const nextUpdatedAt = (previous: Date, clock: Clock): Date => {
  const now = clock();
  return now.getTime() < previous.getTime() ? previous : now;
};
