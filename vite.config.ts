import { defineConfig, loadEnv } from 'vite';
import react from '@vitejs/plugin-react';

export default defineConfig(({ mode }) => {
  const env = loadEnv(mode, process.cwd(), '');
  const apiPort = env.PORT || '8787';

  return {
    plugins: [react()],
    server: {
      port: 3000,
      proxy: {
        '/api': `http://localhost:${apiPort}`,
        '/health': `http://localhost:${apiPort}`,
      },
    },
    build: {
      outDir: 'dist',
    },
  };
});
