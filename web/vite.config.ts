import { fileURLToPath } from "node:url"
import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'

export default defineConfig(() => {
  const coreRoot = fileURLToPath(new URL("../src/core", import.meta.url))

  return {
    root: fileURLToPath(new URL(".", import.meta.url)),
    plugins: [react()],
    resolve: {
      alias: {
        "#core": coreRoot,
      },
    },
  }
})
