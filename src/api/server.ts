import { createServer, type RequestListener, type Server } from 'http';

/** Resolves once listening; bind failures such as EADDRINUSE reject instead of throwing. */
export function listen(app: RequestListener, port: number, host: string): Promise<Server> {
  const httpServer = createServer(app);
  return new Promise<Server>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(port, host, () => {
      httpServer.off('error', reject);
      resolve(httpServer);
    });
  });
}
