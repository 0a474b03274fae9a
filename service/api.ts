import http from 'http';
import { URL } from 'url';
import { Address } from '@ton/core';
import { KeyPair, parsePublicKeyHex, displayKeyInfo } from './keys';
import { verifyMintRequest } from './signing';
import { ServiceConfig } from './config';
import { RegistryError, RegistryErrorKind } from './errors';
import { WhaleMinter } from './minting';
import { WhaleWatcher } from './watcher';

export interface ApiContext {
    keys: KeyPair;
    config: ServiceConfig;
    minter: WhaleMinter;
    watcher?: WhaleWatcher;
    // "<publicKey>:<queryId>" of every mint request already served
    usedRequests: Set<string>;
}

export interface ApiResponse {
    status: number;
    payload: unknown;
}

type RequestHandler = (ctx: ApiContext, body: unknown, query: URLSearchParams) => Promise<unknown>;

const routes: Record<string, RequestHandler> = {};

const statusByKind: Record<RegistryErrorKind, number> = {
    InvalidRecipient: 400,
    IdentifierCollision: 500,
    UnauthorizedMinter: 403,
    TokenNotFound: 404,
    NotTokenOwner: 403,
    CorruptSnapshot: 500,
    WatcherError: 409,
};

// Register route handler
function route(method: 'GET' | 'POST', path: string, handler: RequestHandler) {
    routes[`${method} ${path}`] = handler;
}

function requireField(body: unknown, name: string): string {
    if (typeof body === 'object' && body !== null && name in body) {
        const value: unknown = Reflect.get(body, name);
        if (typeof value === 'string' && value !== '') return value;
    }
    throw new Error(`Missing required field: ${name}`);
}

function requireParam(query: URLSearchParams, name: string): string {
    const value = query.get(name);
    if (!value) {
        throw new Error(`Missing required query parameter: ${name}`);
    }
    return value;
}

function parseUint(name: string, value: string): bigint {
    if (!/^\d+$/.test(value)) {
        throw new Error(`Invalid ${name}: ${value}`);
    }
    return BigInt(value);
}

function requireWatcher(ctx: ApiContext): WhaleWatcher {
    if (!ctx.watcher) {
        throw new Error('Whale watch not configured (set WATCH_ADDRESS)');
    }
    return ctx.watcher;
}

// Parse JSON body
async function parseBody(req: http.IncomingMessage): Promise<unknown> {
    return new Promise((resolve, reject) => {
        let data = '';
        req.on('data', (chunk) => (data += chunk));
        req.on('end', () => {
            try {
                resolve(data ? JSON.parse(data) : {});
            } catch (e) {
                reject(new Error('Invalid JSON'));
            }
        });
        req.on('error', reject);
    });
}

// === API Routes ===

// GET /health - Health check
route('GET', '/health', async () => ({ status: 'ok', timestamp: Date.now() }));

// GET /info - Service and registry info
route('GET', '/info', async (ctx) => ({
    publicKey: Buffer.from(ctx.keys.publicKey).toString('hex'),
    network: ctx.config.network,
    mintPolicy: ctx.config.mintPolicy,
    collectionAddress: ctx.config.collectionAddress?.toString() ?? null,
    watchAddress: ctx.config.watchAddress?.toString() ?? null,
    whaleThreshold: ctx.config.whaleThreshold.toString(),
    nextTokenId: ctx.minter.registry.nextTokenId.toString(),
    totalMinted: ctx.minter.registry.totalMinted().toString(),
}));

// POST /mint - Mint a whale to ownerAddress (signed by an authorized minter key)
route('POST', '/mint', async (ctx, body) => {
    const owner = Address.parse(requireField(body, 'ownerAddress'));
    const queryId = parseUint('queryId', requireField(body, 'queryId'));
    const publicKey = parsePublicKeyHex(requireField(body, 'publicKey'));
    const signature = requireField(body, 'signature');

    if (!verifyMintRequest(owner, queryId, signature, publicKey)) {
        throw new RegistryError('UnauthorizedMinter', 'Invalid mint signature');
    }

    const requestKey = `${publicKey.toString(16)}:${queryId}`;
    if (ctx.usedRequests.has(requestKey)) {
        throw new RegistryError('UnauthorizedMinter', 'Mint request already used', { queryId: queryId.toString() });
    }

    const tokenId = ctx.minter.mint(owner, publicKey);
    ctx.usedRequests.add(requestKey);

    const { published, failure } = await ctx.minter.publish();

    return {
        success: true,
        tokenId: tokenId.toString(),
        ownerAddress: owner.toString(),
        published: published.some((whale) => whale.tokenId === tokenId),
        publishError: failure ? failure.error.message : null,
    };
});

// GET /owner?id= - Current owner of a whale
route('GET', '/owner', async (ctx, body, query) => {
    const tokenId = parseUint('id', requireParam(query, 'id'));
    return {
        tokenId: tokenId.toString(),
        ownerAddress: ctx.minter.registry.ownerOf(tokenId).toString(),
    };
});

// GET /tokens?owner= - Whales held by an address
route('GET', '/tokens', async (ctx, body, query) => {
    const owner = Address.parse(requireParam(query, 'owner'));
    const tokens = ctx.minter.registry.ledger.tokensOf(owner);
    return {
        ownerAddress: owner.toString(),
        count: tokens.length,
        tokens: tokens.map((id) => id.toString()),
    };
});

// POST /watch/start - Start polling for whale transfers
route('POST', '/watch/start', async (ctx) => ({ message: requireWatcher(ctx).start() }));

// POST /watch/stop - Stop polling before the limit
route('POST', '/watch/stop', async (ctx) => ({ message: requireWatcher(ctx).stop() }));

// GET /watch/status - Polling state
route('GET', '/watch/status', async (ctx) => {
    const watcher = requireWatcher(ctx);
    return { polling: watcher.isPolling(), pollCount: watcher.getPollCount() };
});

// GET /watch/logs - Whale transfers seen since the last start
route('GET', '/watch/logs', async (ctx) => ({ logs: requireWatcher(ctx).getLogs() }));

/**
 * Route a request without touching the network; the HTTP server wraps this.
 */
export async function dispatch(
    ctx: ApiContext,
    method: string,
    rawUrl: string,
    body: unknown = {}
): Promise<ApiResponse> {
    const url = new URL(rawUrl, 'http://localhost');
    const handler = routes[`${method} ${url.pathname}`];

    if (!handler) {
        return { status: 404, payload: { error: 'Not found', path: url.pathname } };
    }

    try {
        return { status: 200, payload: await handler(ctx, body, url.searchParams) };
    } catch (error) {
        if (error instanceof RegistryError) {
            console.error(`API Error [${error.kind}]:`, error.message);
            return { status: statusByKind[error.kind], payload: { error: error.message, kind: error.kind } };
        }
        const message = error instanceof Error ? error.message : String(error);
        console.error('API Error:', message);
        return { status: 400, payload: { error: message } };
    }
}

// Create HTTP server
export function createServer(ctx: ApiContext): http.Server {
    const server = http.createServer(async (req, res) => {
        res.setHeader('Content-Type', 'application/json');
        res.setHeader('Access-Control-Allow-Origin', '*');
        res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
        res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

        if (req.method === 'OPTIONS') {
            res.writeHead(200);
            res.end();
            return;
        }

        let result: ApiResponse;
        try {
            const body = req.method === 'POST' ? await parseBody(req) : {};
            result = await dispatch(ctx, req.method || 'GET', req.url || '/', body);
        } catch (error) {
            result = { status: 400, payload: { error: error instanceof Error ? error.message : String(error) } };
        }

        res.writeHead(result.status);
        res.end(JSON.stringify(result.payload, null, 2));
    });

    return server;
}

// Start server
export function startServer(ctx: ApiContext): http.Server {
    const server = createServer(ctx);
    server.listen(ctx.config.port, () => {
        console.log(`\nWhale Minter Service running on http://localhost:${ctx.config.port}`);
        console.log('\nAvailable endpoints:');
        console.log('  GET  /health        - Health check');
        console.log('  GET  /info          - Service and registry info');
        console.log('  POST /mint          - Mint a whale (signed request)');
        console.log('  GET  /owner?id=     - Owner of a whale');
        console.log('  GET  /tokens?owner= - Whales held by an address');
        console.log('  POST /watch/start   - Start whale watch');
        console.log('  POST /watch/stop    - Stop whale watch');
        console.log('  GET  /watch/status  - Whale watch state');
        console.log('  GET  /watch/logs    - Whale transfers seen');
        console.log(`\nMint policy: ${ctx.config.mintPolicy}`);
        displayKeyInfo(ctx.keys);
    });
    return server;
}
