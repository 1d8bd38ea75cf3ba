import SnakePage from './pages/SnakePage';
import { createLogger } from './utils/logger';

const logger = createLogger('App');

logger.log('Module loaded');

function App() {
  return (
    <main className="app">
      <SnakePage />
    </main>
  );
}

export default App;
