export interface Clock {
  now(): Date;
}

export const system_clock: Clock = {
  now: () => new Date(),
};

// Always reports the same instant
export function fixed_clock(instant: Date): Clock {
  return {
    now: () => new Date(instant.getTime()),
  };
}
