import type { IConfig } from "../ports/config"

export class Config<T extends Record<string, unknown>> implements IConfig<T> {
  readonly value: T

  constructor(data: T) {
    this.value = Object.freeze({ ...data })
  }

  get<K extends keyof T & string>(key: K): T[K] {
    return this.value[key]
  }
}
