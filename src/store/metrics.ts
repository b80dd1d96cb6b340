export interface MetricsSnapshot {
  bookings: {
    inquiries: number;
    confirmed: number;
    released: number;
    statusChanges: number;
  };
  conflicts: {
    insufficientCapacity: number;
    lostRaces: number;
  };
  locks: {
    acquired: number;
    waits: number;
    contentionRate: number;
  };
  timing: {
    transitionP95Ms: number | null;
    sampleCount: number;
  };
}

export class MetricsStore {
  private inquiriesCreated = 0;
  private confirmations = 0;
  private releases = 0;
  private statusChanges = 0;
  private capacityConflicts = 0;
  private lostRaces = 0;
  private lockWaits = 0;
  private lockAcquired = 0;

  private transitionTimes: number[] = [];
  private readonly maxSamples = 100;

  incInquiry() {
    this.inquiriesCreated++;
  }

  incConfirmed() {
    this.confirmations++;
  }

  incReleased() {
    this.releases++;
  }

  incStatusChange() {
    this.statusChanges++;
  }

  incCapacityConflict() {
    this.capacityConflicts++;
  }

  incLostRace() {
    this.lostRaces++;
  }

  incLockWait() {
    this.lockWaits++;
  }

  incLockAcquired() {
    this.lockAcquired++;
  }

  recordTransitionTime(ms: number) {
    this.transitionTimes.push(ms);
    if (this.transitionTimes.length > this.maxSamples) {
      this.transitionTimes.shift();
    }
  }

  private calcP95(): number | null {
    if (this.transitionTimes.length < 5) return null;
    const sorted = [...this.transitionTimes].sort((a, b) => a - b);
    const idx = Math.min(Math.floor(sorted.length * 0.95), sorted.length - 1);
    return sorted[idx] ?? null;
  }

  getSnapshot(): MetricsSnapshot {
    return {
      bookings: {
        inquiries: this.inquiriesCreated,
        confirmed: this.confirmations,
        released: this.releases,
        statusChanges: this.statusChanges,
      },
      conflicts: {
        insufficientCapacity: this.capacityConflicts,
        lostRaces: this.lostRaces,
      },
      locks: {
        acquired: this.lockAcquired,
        waits: this.lockWaits,
        contentionRate: this.lockAcquired > 0
          ? Number((this.lockWaits / this.lockAcquired).toFixed(3))
          : 0,
      },
      timing: {
        transitionP95Ms: this.calcP95(),
        sampleCount: this.transitionTimes.length,
      },
    };
  }
}
