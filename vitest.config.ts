import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Test environment
    environment: 'node',
    
    // Test file patterns
    include: [
      'src/**/*.{test,spec}.ts',
      'optimizer/**/*.{test,spec}.ts',
      'scripts/**/*.{test,spec}.ts',
      'tests/**/*.{test,spec}.ts'
    ],
    
    // Exclude patterns
    exclude: [
      'node_modules/**',
      'dist/**',
      '**/*.d.ts'
    ],
    
    setupFiles: ['./tests/setup/test-setup.ts'],
    
    // Test timeout
    testTimeout: 10000,
    hookTimeout: 10000,
    
    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      reportsDirectory: './coverage',
      
      thresholds: {
        lines: 85,
        functions: 85,
        branches: 80,
        statements: 85
      },
      
      include: [
        'src/**/*.ts',
        'optimizer/**/*.ts'
      ],
      
      exclude: [
        '**/*.d.ts',
        '**/*.test.ts',
        '**/*.spec.ts',
        'tests/**',
        'scripts/**',
        'src/index.ts'
      ]
    },
    
    pool: 'threads',
    
    // Mock configuration
    clearMocks: true,
    restoreMocks: true,
    
    watch: false
  }
})
