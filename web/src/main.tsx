import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import './index.css';
import { createLogger } from './utils/logger';

const logger = createLogger('main');

logger.log('Starting app initialization...');

const showFatalError = (title: string, detail: string) => {
  const container = document.createElement('div');
  container.className = 'fatal-error';
  const heading = document.createElement('h1');
  heading.textContent = title;
  const pre = document.createElement('pre');
  pre.textContent = detail;
  container.append(heading, pre);
  document.body.replaceChildren(container);
};

window.addEventListener('error', (event) => {
  logger.error('Uncaught error', event.error);
  const detail = event.error instanceof Error ? event.error.stack ?? event.error.message : String(event.message);
  showFatalError('JavaScript Error', detail);
});

window.addEventListener('unhandledrejection', (event) => {
  logger.error('Unhandled promise rejection', event.reason);
});

const start = async () => {
  try {
    const { default: App } = await import('./App');

    const rootElement = document.getElementById('root');
    if (!rootElement) {
      throw new Error('Root element not found! Make sure index.html has <div id="root"></div>');
    }

    createRoot(rootElement).render(
      <StrictMode>
        <App />
      </StrictMode>
    );
    logger.log('App rendered');
  } catch (error) {
    logger.error('Failed to initialize app:', error);
    showFatalError('Failed to Initialize App', error instanceof Error ? error.stack ?? error.message : String(error));
  }
};

void start();
