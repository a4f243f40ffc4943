"use client";

import { useState } from 'react';
import { PlusIcon } from '@heroicons/react/24/outline';
import { postJson } from './api-client';

interface CreateEventFormProps {
    onCreated: () => void;
}

const EMPTY_FORM = {
    date: '',
    title: '',
    source_url: '',
    event_type: '',
    department: '',
    industries: '',
};

type FormState = typeof EMPTY_FORM;

export function CreateEventForm({ onCreated }: CreateEventFormProps) {
    const [form, setForm] = useState<FormState>(EMPTY_FORM);
    const [saving, setSaving] = useState(false);
    const [message, setMessage] = useState<{ ok: boolean; text: string } | null>(null);

    const update = (key: keyof FormState) => (e: React.ChangeEvent<HTMLInputElement>) => {
        setForm(prev => ({ ...prev, [key]: e.target.value }));
    };

    const handleSubmit = async (e: React.FormEvent) => {
        e.preventDefault();
        setSaving(true);
        setMessage(null);
        try {
            const outcome = await postJson('/api/create-event', { ...form }, 'Event created');
            setMessage({ ok: outcome.ok, text: outcome.message });
            if (outcome.ok) {
                setForm(EMPTY_FORM);
                onCreated();
            }
        } catch (err) {
            setMessage({ ok: false, text: err instanceof Error ? err.message : 'Network error' });
        } finally {
            setSaving(false);
        }
    };

    return (
        <form onSubmit={(e) => void handleSubmit(e)} className="border-t border-card-border pt-4 space-y-2">
            <div className="text-xs text-foreground-muted">Add event</div>
            <div className="grid grid-cols-1 md:grid-cols-3 gap-2">
                <input type="date" value={form.date} onChange={update('date')} className="input" required />
                <input value={form.title} onChange={update('title')} placeholder="Title" className="input md:col-span-2" required />
                <input value={form.source_url} onChange={update('source_url')} placeholder="Source URL" className="input" />
                <input value={form.event_type} onChange={update('event_type')} placeholder="Event type" className="input" />
                <input value={form.department} onChange={update('department')} placeholder="Department" className="input" />
                <input value={form.industries} onChange={update('industries')} placeholder="Industries (comma separated)" className="input md:col-span-2" />
                <button type="submit" className="btn-primary flex items-center justify-center gap-2" disabled={saving}>
                    <PlusIcon className="w-4 h-4" />
                    {saving ? 'Saving...' : 'Create'}
                </button>
            </div>
            {message && (
                <p className={`text-xs ${message.ok ? 'text-accent-light' : 'text-bullish-light'}`}>{message.text}</p>
            )}
        </form>
    );
}
