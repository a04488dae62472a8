'use client';

import { useState } from 'react';
import { useRouter } from 'next/navigation';
import { useForm } from 'react-hook-form';
import { zodResolver } from '@hookform/resolvers/zod';
import { Loader2, MapPin, Plus, Tags, Trash2 } from 'lucide-react';
import { toast } from 'sonner';
import { Badge } from '@/components/ui/badge';
import { Button } from '@/components/ui/button';
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from '@/components/ui/card';
import { Input } from '@/components/ui/input';
import { Label } from '@/components/ui/label';
import { Table, TableBody, TableCell, TableHead, TableHeader, TableRow } from '@/components/ui/table';
import { CSRF_HEADER } from '@/lib/constants/csrf';
import {
  apiResultSchema,
  categoryFormSchema,
  locationFormSchema,
  type CategoryFormData,
  type LocationFormData,
} from '@/lib/validations';

export interface LocationItem {
  id: number;
  name: string;
  isActive: boolean;
}

export interface CategoryItem {
  id: number;
  keyName: string;
  displayName: string;
  isActive: boolean;
}

interface InventoryConfigManagerProps {
  locations: LocationItem[];
  categories: CategoryItem[];
  csrfToken: string;
}

async function callApi(
  url: string,
  method: 'POST' | 'DELETE',
  csrfToken: string,
  body?: unknown
): Promise<{ success: boolean; message: string }> {
  const res = await fetch(url, {
    method,
    headers: { 'Content-Type': 'application/json', [CSRF_HEADER]: csrfToken },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  const parsed = apiResultSchema.safeParse(await res.json().catch(() => null));
  if (!parsed.success) {
    return { success: false, message: `Unerwartete Antwort (${res.status})` };
  }
  return parsed.data;
}

function ActiveBadge({ active }: { active: boolean }) {
  return active ? (
    <Badge variant="outline" className="border-green-200 bg-green-100 text-green-800">Aktiv</Badge>
  ) : (
    <Badge variant="secondary">Inaktiv</Badge>
  );
}

export function InventoryConfigManager({ locations, categories, csrfToken }: InventoryConfigManagerProps) {
  const router = useRouter();
  const [deletingKey, setDeletingKey] = useState<string | null>(null);

  const locationForm = useForm<LocationFormData>({
    resolver: zodResolver(locationFormSchema),
    defaultValues: { location_name: '' },
  });
  const categoryForm = useForm<CategoryFormData>({
    resolver: zodResolver(categoryFormSchema),
    defaultValues: { key_name: '', display_name: '' },
  });

  const report = (result: { success: boolean; message: string }) => {
    if (result.success) {
      toast.success(result.message);
      router.refresh();
    } else {
      toast.error(result.message);
    }
  };

  const onAddLocation = async (data: LocationFormData) => {
    try {
      const result = await callApi('/api/inventory/locations', 'POST', csrfToken, data);
      report(result);
      if (result.success) locationForm.reset();
    } catch (e) {
      console.error(e);
      toast.error('Standort konnte nicht hinzugefügt werden');
    }
  };

  const onAddCategory = async (data: CategoryFormData) => {
    try {
      const result = await callApi('/api/inventory/categories', 'POST', csrfToken, data);
      report(result);
      if (result.success) categoryForm.reset();
    } catch (e) {
      console.error(e);
      toast.error('Kategorie konnte nicht hinzugefügt werden');
    }
  };

  const onDelete = async (kind: 'locations' | 'categories', id: number, label: string) => {
    if (!window.confirm(`"${label}" wirklich löschen?`)) return;
    const key = `${kind}-${id}`;
    setDeletingKey(key);
    try {
      report(await callApi(`/api/inventory/${kind}/${id}`, 'DELETE', csrfToken));
    } catch (e) {
      console.error(e);
      toast.error('Löschen fehlgeschlagen');
    } finally {
      setDeletingKey(null);
    }
  };

  return (
    <div className="grid gap-6 lg:grid-cols-2">
      <Card>
        <CardHeader>
          <CardTitle className="flex items-center gap-2">
            <MapPin className="h-5 w-5" />
            Standorte
          </CardTitle>
          <CardDescription>Lagerorte, die Gegenständen zugewiesen werden können.</CardDescription>
        </CardHeader>
        <CardContent className="space-y-4">
          <form onSubmit={locationForm.handleSubmit(onAddLocation)} className="flex items-end gap-2">
            <div className="flex-1 space-y-2">
              <Label htmlFor="location_name">Neuer Standort</Label>
              <Input id="location_name" placeholder="z.B. Lager H-1.88" {...locationForm.register('location_name')} />
              {locationForm.formState.errors.location_name && (
                <p className="text-sm text-red-600">{locationForm.formState.errors.location_name.message}</p>
              )}
            </div>
            <Button type="submit" disabled={locationForm.formState.isSubmitting}>
              {locationForm.formState.isSubmitting ? (
                <Loader2 className="h-4 w-4 animate-spin" />
              ) : (
                <Plus className="h-4 w-4" />
              )}
              Hinzufügen
            </Button>
          </form>

          <Table>
            <TableHeader>
              <TableRow>
                <TableHead>Name</TableHead>
                <TableHead>Status</TableHead>
                <TableHead className="w-12" />
              </TableRow>
            </TableHeader>
            <TableBody>
              {locations.length === 0 ? (
                <TableRow>
                  <TableCell colSpan={3} className="text-center text-muted-foreground">
                    Keine Standorte konfiguriert.
                  </TableCell>
                </TableRow>
              ) : (
                locations.map((location) => (
                  <TableRow key={location.id}>
                    <TableCell>{location.name}</TableCell>
                    <TableCell>
                      <ActiveBadge active={location.isActive} />
                    </TableCell>
                    <TableCell>
                      <Button
                        variant="ghost"
                        size="icon"
                        aria-label={`${location.name} löschen`}
                        disabled={deletingKey === `locations-${location.id}`}
                        onClick={() => void onDelete('locations', location.id, location.name)}
                      >
                        <Trash2 className="h-4 w-4 text-red-600" />
                      </Button>
                    </TableCell>
                  </TableRow>
                ))
              )}
            </TableBody>
          </Table>
        </CardContent>
      </Card>

      <Card>
        <CardHeader>
          <CardTitle className="flex items-center gap-2">
            <Tags className="h-5 w-5" />
            Kategorien
          </CardTitle>
          <CardDescription>Schlüssel und Anzeigenamen der Inventar-Kategorien.</CardDescription>
        </CardHeader>
        <CardContent className="space-y-4">
          <form onSubmit={categoryForm.handleSubmit(onAddCategory)} className="grid gap-2 sm:grid-cols-[1fr_1fr_auto] sm:items-end">
            <div className="space-y-2">
              <Label htmlFor="key_name">Schlüssel</Label>
              <Input id="key_name" placeholder="z.B. technik" {...categoryForm.register('key_name')} />
              {categoryForm.formState.errors.key_name && (
                <p className="text-sm text-red-600">{categoryForm.formState.errors.key_name.message}</p>
              )}
            </div>
            <div className="space-y-2">
              <Label htmlFor="display_name">Anzeigename</Label>
              <Input id="display_name" placeholder="z.B. Technik" {...categoryForm.register('display_name')} />
              {categoryForm.formState.errors.display_name && (
                <p className="text-sm text-red-600">{categoryForm.formState.errors.display_name.message}</p>
              )}
            </div>
            <Button type="submit" disabled={categoryForm.formState.isSubmitting}>
              {categoryForm.formState.isSubmitting ? (
                <Loader2 className="h-4 w-4 animate-spin" />
              ) : (
                <Plus className="h-4 w-4" />
              )}
              Hinzufügen
            </Button>
          </form>

          <Table>
            <TableHeader>
              <TableRow>
                <TableHead>Schlüssel</TableHead>
                <TableHead>Anzeigename</TableHead>
                <TableHead>Status</TableHead>
                <TableHead className="w-12" />
              </TableRow>
            </TableHeader>
            <TableBody>
              {categories.length === 0 ? (
                <TableRow>
                  <TableCell colSpan={4} className="text-center text-muted-foreground">
                    Keine Kategorien konfiguriert.
                  </TableCell>
                </TableRow>
              ) : (
                categories.map((category) => (
                  <TableRow key={category.id}>
                    <TableCell className="font-mono text-xs">{category.keyName}</TableCell>
                    <TableCell>{category.displayName}</TableCell>
                    <TableCell>
                      <ActiveBadge active={category.isActive} />
                    </TableCell>
                    <TableCell>
                      <Button
                        variant="ghost"
                        size="icon"
                        aria-label={`${category.displayName} löschen`}
                        disabled={deletingKey === `categories-${category.id}`}
                        onClick={() => void onDelete('categories', category.id, category.displayName)}
                      >
                        <Trash2 className="h-4 w-4 text-red-600" />
                      </Button>
                    </TableCell>
                  </TableRow>
                ))
              )}
            </TableBody>
          </Table>
        </CardContent>
      </Card>
    </div>
  );
}
