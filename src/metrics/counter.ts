function emptyCounters() {
    return {
        received: 0,
        accepted: 0,
        anomalies: 0,
        missing_fields: 0,
        rejected_invalid: 0,
        rejected_aborted: 0,
        dropped_malformed: 0,
        persist_failed: 0,
        ml_no_opinion: 0,
        alerts_raised: 0,
        alerts_published: 0,
        alerts_publish_failed: 0,
    };
}

export type Counters = ReturnType<typeof emptyCounters>;

export class Metrics {
    private counters = emptyCounters();

    incrementReceived(): void {
        this.counters.received++;
    }

    incrementAccepted(): void {
        this.counters.accepted++;
    }

    incrementAnomalies(): void {
        this.counters.anomalies++;
    }

    incrementMissingFields(): void {
        this.counters.missing_fields++;
    }

    incrementRejectedInvalid(): void {
        this.counters.rejected_invalid++;
    }

    incrementRejectedAborted(): void {
        this.counters.rejected_aborted++;
    }

    incrementDroppedMalformed(): void {
        this.counters.dropped_malformed++;
    }

    incrementPersistFailed(): void {
        this.counters.persist_failed++;
    }

    incrementMlNoOpinion(): void {
        this.counters.ml_no_opinion++;
    }

    incrementAlertsRaised(): void {
        this.counters.alerts_raised++;
    }

    incrementAlertsPublished(): void {
        this.counters.alerts_published++;
    }

    incrementAlertsPublishFailed(): void {
        this.counters.alerts_publish_failed++;
    }

    getCounters(): Counters {
        return { ...this.counters };
    }

    reset(): void {
        this.counters = emptyCounters();
    }
}
