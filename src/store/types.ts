export type AsyncStatus = 'idle' | 'loading' | 'ready' | 'error';

export type StoreSetter<TState> = (
  partial: Partial<TState> | ((state: TState) => Partial<TState>),
  replace?: boolean,
) => void;
