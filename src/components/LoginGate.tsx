import { useState } from 'react';
import type { FormEvent } from 'react';
import { login } from '../api/client';

interface LoginGateProps {
  title: string;
  onAuthenticated: (password: string) => void;
}

export default function LoginGate({ title, onAuthenticated }: LoginGateProps) {
  const [password, setPassword] = useState('');
  const [error, setError] = useState<string | null>(null);
  const [submitting, setSubmitting] = useState(false);

  const handleSubmit = (e: FormEvent) => {
    e.preventDefault();
    if (!password || submitting) return;
    setSubmitting(true);
    setError(null);
    login(password)
      .then((ok) => {
        if (ok) onAuthenticated(password);
        else setError('Incorrect password. Please try again.');
      })
      .catch((err: unknown) => {
        console.error('Login error:', err);
        setError(err instanceof Error ? err.message : 'Login failed');
      })
      .finally(() => setSubmitting(false));
  };

  return (
    <div className="login-gate">
      <form className="login-card" onSubmit={handleSubmit}>
        <h1>{title}</h1>
        <p className="subtitle">Enter the access password to continue.</p>
        <input
          type="password"
          className="text-input"
          value={password}
          onChange={(e) => setPassword(e.target.value)}
          placeholder="Password"
          aria-label="Password"
          autoFocus
        />
        {error && (
          <p className="form-error" role="alert">
            {error}
          </p>
        )}
        <button type="submit" className="analyze-btn" disabled={!password || submitting}>
          {submitting ? 'Checking...' : 'Log in'}
        </button>
      </form>
    </div>
  );
}
