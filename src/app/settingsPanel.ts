import { DEFAULT_SETTINGS, type Settings } from '../core/settings';
import type { SettingsStore } from '../core/settingsStore';

export type SettingsPanel = {
  element: HTMLElement;
  destroy: () => void;
};

type SliderOptions = {
  min: number;
  max: number;
  step: number;
  read: (settings: Settings) => number;
  write: (value: number) => void;
};

const clamp = (value: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, value));

export function createSettingsPanel(
  settingsStore: SettingsStore,
): SettingsPanel {
  const element = document.createElement('div');
  Object.assign(element.style, {
    display: 'flex',
    flexDirection: 'column',
    gap: '6px',
    marginTop: '12px',
  });

  const syncers: ((settings: Settings) => void)[] = [];

  const applyTiming = (patch: Partial<Settings['timing']>) => {
    settingsStore.apply({
      timing: { ...settingsStore.get().timing, ...patch },
    });
  };

  const makeMsSlider = (labelText: string, options: SliderOptions) => {
    const wrapper = document.createElement('div');
    const label = document.createElement('div');
    label.textContent = labelText;
    Object.assign(label.style, {
      color: '#b6c2d4',
      fontSize: '11px',
      letterSpacing: '0.3px',
    });

    const row = document.createElement('div');
    Object.assign(row.style, {
      display: 'flex',
      alignItems: 'center',
      gap: '8px',
    });

    const slider = document.createElement('input');
    slider.type = 'range';
    slider.min = String(options.min);
    slider.max = String(options.max);
    slider.step = String(options.step);
    Object.assign(slider.style, {
      flex: '1',
      accentColor: '#6ea8ff',
    });

    const value = document.createElement('span');
    Object.assign(value.style, {
      color: '#e2e8f0',
      fontSize: '11px',
      width: '40px',
      textAlign: 'right',
    });

    slider.addEventListener('input', () => {
      const next = Number(slider.value);
      if (!Number.isFinite(next)) return;
      options.write(clamp(next, options.min, options.max));
    });

    syncers.push((settings) => {
      const current = options.read(settings);
      slider.value = String(current);
      value.textContent = String(current);
    });

    row.append(slider, value);
    wrapper.append(label, row);
    element.appendChild(wrapper);
  };

  makeMsSlider('Gravity tick (ms)', {
    min: 100,
    max: 2000,
    step: 50,
    read: (s) => s.timing.tickMs,
    write: (tickMs) => applyTiming({ tickMs }),
  });
  makeMsSlider('Drop cooldown after lock (ms)', {
    min: 0,
    max: 10000,
    step: 250,
    read: (s) => s.timing.dropCooldownMs,
    write: (dropCooldownMs) => applyTiming({ dropCooldownMs }),
  });
  makeMsSlider('Move delay (ms)', {
    min: 0,
    max: 1000,
    step: 10,
    read: (s) => s.timing.moveDelayMs,
    write: (moveDelayMs) => applyTiming({ moveDelayMs }),
  });
  makeMsSlider('Rotate cooldown (ms)', {
    min: 0,
    max: 2000,
    step: 50,
    read: (s) => s.timing.rotateCooldownMs,
    write: (rotateCooldownMs) => applyTiming({ rotateCooldownMs }),
  });
  makeMsSlider('Hard drop cooldown (ms)', {
    min: 0,
    max: 3000,
    step: 50,
    read: (s) => s.timing.hardDropCooldownMs,
    write: (hardDropCooldownMs) => applyTiming({ hardDropCooldownMs }),
  });
  makeMsSlider('Gesture debounce (ms)', {
    min: 0,
    max: 3000,
    step: 50,
    read: (s) => s.gestures.debounceMs,
    write: (debounceMs) => settingsStore.apply({ gestures: { debounceMs } }),
  });

  const zonesLabel = document.createElement('label');
  Object.assign(zonesLabel.style, {
    color: '#b6c2d4',
    fontSize: '11px',
    display: 'flex',
    alignItems: 'center',
    gap: '6px',
  });
  const zonesToggle = document.createElement('input');
  zonesToggle.type = 'checkbox';
  zonesToggle.addEventListener('change', () => {
    settingsStore.apply({ display: { showZones: zonesToggle.checked } });
  });
  zonesLabel.append(zonesToggle, 'Show pointer zones');
  element.appendChild(zonesLabel);
  syncers.push((settings) => {
    zonesToggle.checked = settings.display.showZones;
  });

  const resetButton = document.createElement('button');
  resetButton.textContent = 'RESET DEFAULTS';
  Object.assign(resetButton.style, {
    padding: '4px 0',
    background: '#121a24',
    color: '#e5e7eb',
    border: '2px solid #1f2a37',
    font: '600 11px system-ui, sans-serif',
    cursor: 'pointer',
  });
  resetButton.addEventListener('click', () => {
    settingsStore.apply(DEFAULT_SETTINGS);
  });
  element.appendChild(resetButton);

  const sync = (settings: Settings) => {
    for (const syncer of syncers) syncer(settings);
  };
  sync(settingsStore.get());
  const unsubscribe = settingsStore.subscribe(sync);

  return {
    element,
    destroy: () => {
      unsubscribe();
      element.remove();
    },
  };
}
