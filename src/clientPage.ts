import type { IceServer } from './mediaEngine.js';

// JSON embedded in a <script> block must not be able to close the element.
function scriptSafeJson(value: unknown): string {
  return JSON.stringify(value).replace(/</g, '\\u003c').replace(/\u2028/g, '\\u2028').replace(/\u2029/g, '\\u2029');
}

/** Bootstrap page served for every plain GET: opens the signaling channel and plays the stream. */
export function clientPageHtml(opts: Readonly<{ iceServers: readonly IceServer[] }>): string {
  return `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>Device mirror</title>
    <style>
      body { font-family: system-ui, sans-serif; margin: 20px; }
      video { width: 100%; max-width: 800px; border: 1px solid #ccc; background: #000; }
      .controls { margin: 10px 0; }
      button { padding: 10px 20px; margin: 5px; }
    </style>
  </head>
  <body>
    <h1>Device mirror</h1>
    <div class="controls">
      <button id="start">Start stream</button>
      <button id="stop">Stop stream</button>
      <span id="status">Disconnected</span>
    </div>
    <video id="video" autoplay playsinline muted></video>
    <script>
      const ICE_SERVERS = ${scriptSafeJson(opts.iceServers)};
      const video = document.getElementById('video');
      const statusEl = document.getElementById('status');
      let pc = null;
      let ws = null;

      function setStatus(text) {
        statusEl.textContent = text;
      }

      function sendSignal(message) {
        if (ws && ws.readyState === WebSocket.OPEN) ws.send(JSON.stringify(message));
      }

      function createPeerConnection() {
        pc = new RTCPeerConnection({ iceServers: ICE_SERVERS });
        pc.ontrack = (event) => {
          video.srcObject = event.streams[0];
          setStatus('Streaming');
        };
        pc.onicecandidate = (event) => {
          if (event.candidate) sendSignal({ type: 'ice-candidate', candidate: event.candidate.toJSON() });
        };
        sendSignal({ type: 'request-offer' });
      }

      async function handleSignal(message) {
        switch (message.type) {
          case 'offer': {
            await pc.setRemoteDescription(message.offer);
            const answer = await pc.createAnswer();
            await pc.setLocalDescription(answer);
            sendSignal({ type: 'answer', answer: { type: answer.type, sdp: answer.sdp } });
            break;
          }
          case 'ice-candidate':
            await pc.addIceCandidate(message.candidate);
            break;
          case 'error':
            setStatus('Gateway error: ' + message.message);
            break;
        }
      }

      function startStream() {
        if (ws) return;
        const scheme = location.protocol === 'https:' ? 'wss://' : 'ws://';
        ws = new WebSocket(scheme + location.host + '/ws');
        ws.onopen = () => {
          setStatus('Negotiating');
          createPeerConnection();
        };
        ws.onmessage = (event) => {
          let message;
          try {
            message = JSON.parse(event.data);
          } catch {
            return;
          }
          handleSignal(message).catch((err) => setStatus('Negotiation failed: ' + err));
        };
        ws.onclose = () => {
          ws = null;
          setStatus('Disconnected');
        };
      }

      function stopStream() {
        if (pc) {
          pc.close();
          pc = null;
        }
        if (ws) {
          ws.close();
          ws = null;
        }
        video.srcObject = null;
        setStatus('Disconnected');
      }

      document.getElementById('start').addEventListener('click', startStream);
      document.getElementById('stop').addEventListener('click', stopStream);
    </script>
  </body>
</html>
`;
}
