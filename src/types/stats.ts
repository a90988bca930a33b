export interface CpuSample {
    timestamp: number;
    cpuPercent: number;
    userCpuTime: number;
    systemCpuTime: number;
}

export interface IoSample {
    timestamp: number;
    readBytes: number;
    writeBytes: number;
    readCount: number;
    writeCount: number;
}

/** One recorded interval of agent telemetry. */
export interface StatSnapshot {
    timestamp: number;
    cpuSamples: CpuSample[];
    ioSamples: IoSample[];
    bytesReceived: number;
    bytesSent: number;
    memoryPercent: number;
    rssSize: number;
    vmsSize: number;
}

export interface TimeseriesPoint {
    timestamp: number;
    value: number;
}
