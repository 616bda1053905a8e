import http from 'http';
import app from './app.js';
import { env } from './config/env.js'; // Use our typed Env
import { connectDB, disconnectDB } from './config/database.js';

const startServer = async () => {
  // 1. Connect to Database
  await connectDB();

  const server = http.createServer(app);

  // 2. Start Server
  server.listen(env.PORT, () => {
    console.log(`Server is running on http://localhost:${env.PORT}`);
    console.log(`Environment: ${env.NODE_ENV}`);
  });


  const shutdown = () => {
    console.log('\nServer is shutting down...');

    // Stop accepting new HTTP requests
    server.close(() => {
      console.log('HTTP Server closed.');

      // Close DB Connection
      disconnectDB()
        .then(() => process.exit(0))
        .catch((err) => {
          console.error(err);
          process.exit(1);
        });
    });
  };

  // Listen for termination signals
  process.on('SIGINT', shutdown);  // Ctrl + C
  process.on('SIGTERM', shutdown); // Docker stop / Cloud provider stop
};


startServer().catch((err) => {
  console.error(err);
  process.exit(1);
});
