import { AsyncLocalStorage } from "node:async_hooks";

import type { RequestDescriptor } from "./types.ts";

/** What the router publishes for the handler of one request. */
export interface RequestContext {
	readonly request: RequestDescriptor;
	readonly captures: readonly unknown[];
}

const storage = new AsyncLocalStorage<RequestContext>();

/** Run `fn` with `ctx` visible to currentContext() for its whole async extent. */
export function runInContext<R>(ctx: RequestContext, fn: () => R): R {
	return storage.run(ctx, fn);
}

/** Context of the request being dispatched, or null outside a dispatch. */
export function currentContext(): RequestContext | null {
	return storage.getStore() ?? null;
}

/** Captured path values of the request being dispatched. */
export function currentCaptures(): readonly unknown[] {
	const ctx = storage.getStore();
	if (ctx === undefined) {
		throw new Error("currentCaptures() called outside Router.dispatch()");
	}
	return ctx.captures;
}
