import type { ServerInfo } from '../api/schemas';

interface SettingsPanelProps {
  apiKey: string;
  onApiKeyChange: (key: string) => void;
  serverInfo: ServerInfo | null;
  onLogout?: () => void;
}

export default function SettingsPanel({ apiKey, onApiKeyChange, serverInfo, onLogout }: SettingsPanelProps) {
  return (
    <div className="sidebar-panel settings-panel">
      <h3>Settings</h3>
      <label className="field-label" htmlFor="api-key">
        OpenAI API key
      </label>
      <input
        id="api-key"
        type="password"
        className="text-input"
        value={apiKey}
        onChange={(e) => onApiKeyChange(e.target.value)}
        placeholder={serverInfo?.explanationConfigured ? 'Using the server key' : 'sk-...'}
        autoComplete="off"
      />
      <p className="hint">Kept in this tab only and sent with each explanation request.</p>
      {serverInfo && (
        <p className="hint">
          Model: <code>{serverInfo.model}</code>
        </p>
      )}
      {onLogout && (
        <button type="button" className="link-btn" onClick={onLogout}>
          Log out
        </button>
      )}
    </div>
  );
}
