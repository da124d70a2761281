/**
 * Layer / initializer composition
 *
 * Registration order maps to nesting depth: adding L1, L2, ..., Ln produces
 *
 *   Stack{ inner: Ln, outer: Stack{ inner: Ln-1, ... Stack{ inner: L1, outer: Identity } } }
 *
 * and `Stack.layer(B) = outer.layer(inner.layer(B))`, so L1 wraps everything
 * (first to see the request, last to see the response) and Ln sits next to
 * the base service. Initializers follow the same law: the first registered
 * runs first.
 */

import type { Extensions } from './extensions';
import type {
  HttpRequest,
  InitializerFunction,
  Layer,
  Middleware,
  Next,
  RequestInitializer,
  ResponseData,
  Service,
} from './middlewareTypes';

/**
 * The neutral element: wraps nothing and changes nothing.
 */
export class Identity {
  layer<S>(inner: S): S {
    return inner;
  }

  init<B>(builder: B): B {
    return builder;
  }
}

export const identity = new Identity();

export class Stack<TReq = HttpRequest, TRes = ResponseData> implements Layer<TReq, TRes> {
  constructor(
    readonly inner: Layer<TReq, TRes>,
    readonly outer: Layer<TReq, TRes>
  ) {}

  layer(service: Service<TReq, TRes>): Service<TReq, TRes> {
    return this.outer.layer(this.inner.layer(service));
  }
}

export class RequestStack<B> implements RequestInitializer<B> {
  constructor(
    readonly inner: RequestInitializer<B>,
    readonly outer: RequestInitializer<B>
  ) {}

  init(builder: B, extensions: Extensions): B {
    return this.inner.init(this.outer.init(builder, extensions), extensions);
  }
}

/**
 * Wrap a function as a service
 */
export function service<TReq = HttpRequest, TRes = ResponseData>(
  call: Next<TReq, TRes>
): Service<TReq, TRes> {
  return { call };
}

/**
 * Wrap a `(request, extensions, next)` function as a layer
 */
export function middleware<TReq = HttpRequest, TRes = ResponseData>(
  fn: Middleware<TReq, TRes>
): Layer<TReq, TRes> {
  return {
    layer(inner) {
      const next: Next<TReq, TRes> = (request, extensions) => inner.call(request, extensions);
      return service((request, extensions) => fn(request, extensions, next));
    },
  };
}

export function initializer<B>(fn: InitializerFunction<B>): RequestInitializer<B> {
  return { init: fn };
}

export function isLayer<TReq, TRes>(
  value: Layer<TReq, TRes> | Middleware<TReq, TRes>
): value is Layer<TReq, TRes> {
  return typeof value !== 'function';
}

export function toLayer<TReq = HttpRequest, TRes = ResponseData>(
  value: Layer<TReq, TRes> | Middleware<TReq, TRes>
): Layer<TReq, TRes> {
  return isLayer(value) ? value : middleware(value);
}

export function toInitializer<B>(
  value: RequestInitializer<B> | InitializerFunction<B>
): RequestInitializer<B> {
  return typeof value === 'function' ? initializer(value) : value;
}

/**
 * Fold layers into one, first element outermost
 */
export function composeLayers<TReq = HttpRequest, TRes = ResponseData>(
  layers: ReadonlyArray<Layer<TReq, TRes> | Middleware<TReq, TRes>>
): Layer<TReq, TRes> {
  return layers.reduce<Layer<TReq, TRes>>(
    (outer, layer) => new Stack(toLayer(layer), outer),
    identity
  );
}

/**
 * Fold initializers into one, first element runs first
 */
export function composeInitializers<B>(
  initializers: ReadonlyArray<RequestInitializer<B> | InitializerFunction<B>>
): RequestInitializer<B> {
  return initializers.reduce<RequestInitializer<B>>(
    (outer, init) => new RequestStack(toInitializer(init), outer),
    identity
  );
}
