import http from 'http';
import app from './api/v1/index';
import { PORT } from './api/v1/config/env';

const server = http.createServer(app);

server.listen(PORT, () => {
    console.log(`Server is running on port ${PORT}`);
});
