/**
 * Health Check Handlers
 *
 * /healthz (liveness), /readyz (readiness) and /health (detail).
 * Framework-agnostic: each handler returns a status code and a body.
 */

export interface HealthCheck {
    name: string;
    check: () => Promise<boolean>;
}

export interface CheckResult {
    name: string;
    status: 'pass' | 'fail';
    latency_ms: number;
}

export interface HealthStatus {
    status: 'healthy' | 'degraded' | 'unhealthy';
    version: string;
    uptime: number;
    checks: CheckResult[];
    timestamp: string;
}

export interface HealthResponse {
    status: 200 | 503;
    body: HealthStatus;
}

async function runChecks(checks: HealthCheck[]): Promise<CheckResult[]> {
    const results: CheckResult[] = [];

    for (const { name, check } of checks) {
        const checkStart = performance.now();
        let passed = false;
        try {
            passed = await check();
        } catch {
            passed = false;
        }
        results.push({
            name,
            status: passed ? 'pass' : 'fail',
            latency_ms: Math.round(performance.now() - checkStart),
        });
    }

    return results;
}

export function createHealthChecks(
    version: string,
    checks: HealthCheck[] = []
) {
    const startTime = Date.now();

    const body = (status: HealthStatus['status'], results: CheckResult[]): HealthStatus => ({
        status,
        version,
        uptime: (Date.now() - startTime) / 1000,
        checks: results,
        timestamp: new Date().toISOString(),
    });

    return {
        /** Liveness: 200 while the process runs, dependencies are not consulted */
        async healthz(): Promise<HealthResponse> {
            return { status: 200, body: body('healthy', []) };
        },

        /** Readiness: 200 only when every dependency answers */
        async readyz(): Promise<HealthResponse> {
            const results = await runChecks(checks);
            const ok = results.every((r) => r.status === 'pass');
            return { status: ok ? 200 : 503, body: body(ok ? 'healthy' : 'unhealthy', results) };
        },

        async health(): Promise<HealthResponse> {
            const results = await runChecks(checks);
            const failed = results.filter((r) => r.status === 'fail').length;
            const status = failed === 0
                ? 'healthy'
                : failed < results.length ? 'degraded' : 'unhealthy';
            return { status: failed === 0 ? 200 : 503, body: body(status, results) };
        },
    };
}

export type HealthChecks = ReturnType<typeof createHealthChecks>;
