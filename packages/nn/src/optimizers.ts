/**
 * Optimizers: SGD (with momentum) and AdamW over named parameter tensors.
 *
 * Both update the live parameter arrays in place and keep their running
 * buffers keyed by parameter name, so a state dict restores them exactly.
 */
import { OptimizerError, Registry, type Optimizer, type OptimizerState, type TensorData } from "@lockstep/core";

function checkGrad(name: string, param: TensorData, grad: TensorData): void {
  if (grad.data.length !== param.data.length) {
    throw new OptimizerError({
      message: `gradient for "${name}" has ${grad.data.length} elements, parameter has ${param.data.length}`,
    });
  }
}

// ── SGD ────────────────────────────────────────────────────────────────────

export interface SGDConfig {
  lr: number;
  momentum: number;
}

export class SGD implements Optimizer {
  readonly name = "sgd";
  private _step = 0;
  private _buf = new Map<string, Float32Array>();
  private readonly config: SGDConfig;

  constructor(config: Partial<SGDConfig> = {}) {
    this.config = {
      lr: config.lr ?? 0.01,
      momentum: config.momentum ?? 0,
    };
  }

  step(params: ReadonlyMap<string, TensorData>, grads: ReadonlyMap<string, TensorData>, gradScale = 1.0): void {
    const { lr, momentum } = this.config;
    this._step++;
    for (const [name, param] of params) {
      const grad = grads.get(name);
      if (!grad) continue;
      checkGrad(name, param, grad);
      const pData = param.data;
      const gData = grad.data;

      if (momentum === 0) {
        for (let i = 0; i < pData.length; i++) pData[i] -= lr * (gData[i] * gradScale);
        continue;
      }

      let buf = this._buf.get(name);
      if (!buf) {
        buf = new Float32Array(pData.length);
        this._buf.set(name, buf);
      }
      for (let i = 0; i < pData.length; i++) {
        buf[i] = momentum * buf[i] + gData[i] * gradScale;
        pData[i] -= lr * buf[i];
      }
    }
  }

  stateDict(): OptimizerState {
    const buffers = new Map<string, TensorData>();
    for (const [name, b] of this._buf) {
      buffers.set(`${name}.momentum`, { shape: [b.length], data: new Float32Array(b) });
    }
    return { step: this._step, buffers, scalars: {} };
  }

  loadStateDict(state: OptimizerState): void {
    this._step = state.step;
    this._buf.clear();
    for (const [key, td] of state.buffers) {
      if (key.endsWith(".momentum")) {
        this._buf.set(key.slice(0, -".momentum".length), new Float32Array(td.data));
      }
    }
  }
}

// ── AdamW ──────────────────────────────────────────────────────────────────

export interface AdamWConfig {
  lr: number;
  beta1: number;
  beta2: number;
  eps: number;
  weightDecay: number;
  noDecayNames?: Set<string>;
}

export class AdamW implements Optimizer {
  readonly name = "adamw";
  private _step = 0;
  private _beta1Pow = 1;
  private _beta2Pow = 1;
  private _m = new Map<string, Float32Array>();
  private _v = new Map<string, Float32Array>();
  private readonly config: AdamWConfig;
  private noDecayNames: Set<string>;

  constructor(config: Partial<AdamWConfig> = {}) {
    this.noDecayNames = config.noDecayNames ?? new Set();
    this.config = {
      lr: config.lr ?? 3e-4,
      beta1: config.beta1 ?? 0.9,
      beta2: config.beta2 ?? 0.999,
      eps: config.eps ?? 1e-8,
      weightDecay: config.weightDecay ?? 0.01,
    };
  }

  step(params: ReadonlyMap<string, TensorData>, grads: ReadonlyMap<string, TensorData>, gradScale = 1.0): void {
    const { lr, beta1, beta2, eps, weightDecay } = this.config;
    this._step++;
    this._beta1Pow *= beta1;
    this._beta2Pow *= beta2;
    const bc1 = 1 - this._beta1Pow;
    const bc2 = 1 - this._beta2Pow;

    for (const [name, param] of params) {
      const grad = grads.get(name);
      if (!grad) continue;
      checkGrad(name, param, grad);
      const size = param.data.length;

      // Lazy init moment buffers
      let m = this._m.get(name);
      let v = this._v.get(name);
      if (!m || !v) {
        m = new Float32Array(size);
        v = new Float32Array(size);
        this._m.set(name, m);
        this._v.set(name, v);
      }

      const wd = this.noDecayNames.has(name) ? 0 : weightDecay;
      const pData = param.data;
      const gData = grad.data;
      for (let j = 0; j < size; j++) {
        const g = gData[j] * gradScale;
        if (wd > 0) pData[j] -= lr * wd * pData[j];
        m[j] = beta1 * m[j] + (1 - beta1) * g;
        v[j] = beta2 * v[j] + (1 - beta2) * g * g;
        const mHat = m[j] / bc1;
        const vHat = v[j] / bc2;
        pData[j] -= lr * mHat / (Math.sqrt(vHat) + eps);
      }
    }
  }

  stateDict(): OptimizerState {
    const buffers = new Map<string, TensorData>();
    for (const [name, m] of this._m) {
      buffers.set(`${name}.m`, { shape: [m.length], data: new Float32Array(m) });
      const v = this._v.get(name);
      if (v) buffers.set(`${name}.v`, { shape: [v.length], data: new Float32Array(v) });
    }
    return { step: this._step, buffers, scalars: { beta1Pow: this._beta1Pow, beta2Pow: this._beta2Pow } };
  }

  loadStateDict(state: OptimizerState): void {
    this._step = state.step;
    // Stored powers are exact; recomputing from the step count is the fallback.
    this._beta1Pow = state.scalars["beta1Pow"] ?? Math.pow(this.config.beta1, this._step);
    this._beta2Pow = state.scalars["beta2Pow"] ?? Math.pow(this.config.beta2, this._step);
    this._m.clear();
    this._v.clear();
    for (const [key, td] of state.buffers) {
      if (key.endsWith(".m")) {
        this._m.set(key.slice(0, -2), new Float32Array(td.data));
      } else if (key.endsWith(".v")) {
        this._v.set(key.slice(0, -2), new Float32Array(td.data));
      }
    }
  }
}

// ── Registry ───────────────────────────────────────────────────────────────

export interface OptimizerSettings {
  readonly lr: number;
  readonly momentum: number;
}

export function createOptimizerRegistry() {
  const registry = new Registry<Optimizer, [OptimizerSettings]>("optimizer");
  registry.register("sgd", (s) => new SGD({ lr: s.lr, momentum: s.momentum }));
  registry.register("adamw", (s) => new AdamW({ lr: s.lr, beta1: s.momentum > 0 ? s.momentum : 0.9 }));
  return registry;
}
