import express from 'express';
import type { ErrorRequestHandler, Request, Response } from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import type { Server as HttpServer } from 'http';
import { LockupKernel } from '../kernel-core/Kernel.js';
import { AuditLog } from '../kernel-core/L5/Audit.js';
import { PrincipalRegistry } from '../kernel-core/L1/Identity.js';
import { SQLiteEventStore } from '../infrastructure/persistence/SQLiteEventStore.js';
import { InMemoryLedger } from '../infrastructure/ledger/InMemoryLedger.js';
import type { InMemoryToken } from '../infrastructure/ledger/InMemoryLedger.js';
import { SystemClock } from '../infrastructure/clock/Clocks.js';
import { LockupPlatform } from '../Platform/LockupPlatform.js';
import type { SignedRequest } from '../Platform/LockupPlatform.js';
import { ValidationError, toPlatformError } from '../Platform/Errors.js';
import { loadConfig } from '../config.js';
import type { LockupConfig } from '../config.js';

type Handler = (request: SignedRequest) => unknown;

const toSignedRequest = (req: Request): SignedRequest => ({
    method: req.method,
    path: req.path,
    body: req.body,
    headers: req.headers
});

export class LockupServer {
    private app: express.Express;
    private server: HttpServer | null = null;

    constructor(private readonly platform: LockupPlatform) {
        this.app = express();
        this.app.use(cors());
        this.app.use(bodyParser.json());
        this.setupRoutes();
    }

    public listen(port: number): Promise<HttpServer> {
        return new Promise((resolve, reject) => {
            const server = this.app.listen(port, () => {
                console.log(`[LockupServer] Listening on port ${port}`);
                resolve(server);
            });
            server.once('error', reject);
            this.server = server;
        });
    }

    public close(): Promise<void> {
        const server = this.server;
        this.server = null;
        if (!server) return Promise.resolve();
        return new Promise((resolve, reject) => {
            server.close(err => (err ? reject(err) : resolve()));
        });
    }

    private setupRoutes(): void {
        this.app.use((req, _res, next) => {
            console.log(`[LockupServer] ${req.method} ${req.url}`);
            next();
        });

        // Queries
        this.app.get('/lockup', this.route('status', () => this.platform.status()));
        this.app.get('/lockup/timeline', this.route('timeline', () => this.platform.timeline()));
        this.app.get('/audit', this.route('audit', () => this.platform.audit()));
        this.app.get('/token/balance/:address', (req, res) => {
            this.respond(res, 'balanceOf', req, () => this.platform.balanceOf(req.params.address));
        });

        // Commands (signed)
        this.app.post('/lockup', this.route('createLockup', r => this.platform.createLockup(r)));
        this.app.post('/lockup/release', this.route('release', r => this.platform.release(r)));
        this.app.post('/lockup/revoke', this.route('revoke', r => this.platform.revoke(r)));
        this.app.post('/ownership', this.route('transferOwnership', r => this.platform.transferOwnership(r)));
        this.app.post('/token/approve', this.route('approve', r => this.platform.approve(r)));

        this.app.use((req, res) => {
            res.status(404).json({ ok: false, code: 'NOT_FOUND', message: `No route for ${req.method} ${req.path}` });
        });

        // body-parser failures land here
        const onError: ErrorRequestHandler = (err: unknown, req, res, _next) => {
            const error = new ValidationError('Malformed request body', [err instanceof Error ? err.message : String(err)]);
            console.warn(`[LockupServer] ${req.method} ${req.path} rejected: ${error.message}`);
            res.status(error.status).json({ ok: false, code: error.code, message: error.message });
        };
        this.app.use(onError);
    }

    private route(operation: string, handler: Handler) {
        return (req: Request, res: Response): void => {
            this.respond(res, operation, req, () => handler(toSignedRequest(req)));
        };
    }

    private respond(res: Response, operation: string, req: Request, work: () => unknown): void {
        const actor = req.header('x-lockup-caller') ?? 'anonymous';
        void Promise.resolve()
            .then(work)
            .then(data => {
                res.json({ ok: true, data });
            })
            .catch((e: unknown) => {
                const error = toPlatformError(e, operation, actor);
                console.warn(`[LockupServer] ${operation} failed (${error.code}): ${error.message}`);
                res.status(error.status).json({ ok: false, code: error.code, message: error.message });
            });
    }
}

export interface LockupRuntime {
    server: LockupServer;
    kernel: LockupKernel;
    ledger: InMemoryLedger;
    token: InMemoryToken;
    store: SQLiteEventStore;
}

/**
 * Wires a kernel over an in-process ledger, persisting audit evidence to SQLite.
 */
export function bootstrap(config: LockupConfig): LockupRuntime {
    const ledger = new InMemoryLedger();
    const token = ledger.deployToken(config.LOCKUP_TOKEN_ADDRESS);
    token.mint(config.LOCKUP_OWNER_ADDRESS, config.LOCKUP_INITIAL_SUPPLY);

    const store = new SQLiteEventStore(config.LOCKUP_DB_PATH);
    const kernel = new LockupKernel({
        token: config.LOCKUP_TOKEN_ADDRESS,
        address: config.LOCKUP_KERNEL_ADDRESS,
        deployer: config.LOCKUP_OWNER_ADDRESS,
        ledger,
        clock: new SystemClock(),
        audit: new AuditLog(store)
    });

    const principals = new PrincipalRegistry();
    for (const { address, publicKey } of config.LOCKUP_PRINCIPALS) {
        principals.register(address, publicKey);
    }

    const server = new LockupServer(new LockupPlatform(kernel, principals, token));
    return { server, kernel, ledger, token, store };
}

// Start if run directly
if (require.main === module) {
    const config = loadConfig();
    const runtime = bootstrap(config);
    runtime.server.listen(config.LOCKUP_PORT).catch((e: unknown) => {
        console.error('[LockupServer] Failed to start:', e);
        runtime.store.close();
        process.exitCode = 1;
    });
}
