import type { GameSession } from '../core/gameSession';
import type { Settings } from '../core/settings';
import type { SettingsStore } from '../core/settingsStore';
import type { PixiRenderer } from '../render/pixiRenderer';

export type SettingsController = {
  start: () => () => void;
};

type SettingsControllerOptions = {
  settingsStore: SettingsStore;
  session: Pick<GameSession, 'applySettings'>;
  renderer: Pick<PixiRenderer, 'setShowZones'>;
};

export function createSettingsController(
  options: SettingsControllerOptions,
): SettingsController {
  const { settingsStore, session, renderer } = options;

  const handleSettingsChange = (next: Settings) => {
    session.applySettings(next);
    renderer.setShowZones(next.display.showZones);
  };

  return {
    start: () => {
      handleSettingsChange(settingsStore.get());
      return settingsStore.subscribe(handleSettingsChange);
    },
  };
}
