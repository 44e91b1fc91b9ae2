// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

import { setTimeout as delay } from 'timers/promises';

export type SleepFn = (ms: number) => Promise<void>;
export type Clock = () => number;

export const sleep: SleepFn = async (ms) => {
  if (ms > 0) {
    await delay(ms);
  }
};

export const systemClock: Clock = () => Date.now();
