export const CFP_TYPES = ['events', 'booths', 'tracks'] as const;

export const CFP_TYPE_LABELS: Record<(typeof CFP_TYPES)[number], string> = {
  events: 'Call for Events',
  booths: 'Call for Booths',
  tracks: 'Call for Tracks',
};
